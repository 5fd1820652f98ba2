export * from './DynamoAssignmentStore';
export * from './DynamoLookupCache';
export * from './DynamoParameterStore';
