/**
 * Injection tokens (string symbols for DI) for ports whose implementations
 * are bound in the infrastructure and engine pool modules.
 */
export const JOB_RECORD_REPOSITORY_PORT = 'JobRecordRepositoryPort';
export const JOB_QUEUE_PORT = 'JobQueuePort';
export const CONTENT_STORAGE_PORT = 'ContentStoragePort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const ENGINE_POOL_PORT = 'EnginePoolPort';
export const TRANSFORM_ENGINE_FACTORY = 'TransformEngineFactory';
