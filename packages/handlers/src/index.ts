export { handler as lookupHandler, __setLookupContextFactory } from './lookup-handler';
export type { LookupAppContext } from './lookup-handler';
export { handler as rotationHandler, __setRotationContextFactory, summarize } from './rotation-handler';
export type { RotationAppContext, RotationSummary } from './rotation-handler';
export * from './env';
export { serializeError } from './observability';
