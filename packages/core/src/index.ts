export * from './domain/errors';
export * from './domain/models';
export * from './domain/duration';
export * from './domain/timeout';
export * from './app/QuestionSelector';
export * from './app/RotationEngine';
export * from './app/LookupService';
export * from './ports/AssignmentStore';
export * from './ports/ConfigSource';
export * from './ports/Logger';
export * from './ports/LookupCache';
