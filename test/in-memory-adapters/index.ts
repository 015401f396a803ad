/**
 * In-Memory Adapters for tests
 * Stand-ins for every output port that needs AWS
 */
export { InMemoryJobRepositoryAdapter } from './in-memory-job-repository.adapter';
export { InMemoryPayloadStoreAdapter } from './in-memory-payload-store.adapter';
export { InMemoryArtifactStorageAdapter } from './in-memory-artifact-storage.adapter';
export { InMemoryMessageQueueAdapter } from './in-memory-message-queue.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { ScriptedRendererAdapter, type RenderStep } from './scripted-renderer.adapter';
