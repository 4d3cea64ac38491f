// Export all in-memory adapters for easy import
export { InMemoryJobRecordRepositoryAdapter } from './in-memory-job-record-repository.adapter';
export { InMemoryJobQueueAdapter } from './in-memory-job-queue.adapter';
export { InMemoryContentStorageAdapter } from './in-memory-content-storage.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { FakeTransformEngine, FakeTransformEngineFactory } from './fake-transform-engine';
export type { TransformBehavior } from './fake-transform-engine';
