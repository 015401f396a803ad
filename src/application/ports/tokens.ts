/**
 * Injection tokens for output ports (string tokens for DI)
 */
export const JOB_STATE_REPOSITORY_PORT = 'JobStateRepositoryPort';
export const JOB_PAYLOAD_STORE_PORT = 'JobPayloadStorePort';
export const ARTIFACT_STORAGE_PORT = 'ArtifactStoragePort';
export const MESSAGE_QUEUE_PORT = 'MessageQueuePort';
export const ARTIFACT_RENDERER_PORT = 'ArtifactRendererPort';
export const BUNDLE_BUILDER_PORT = 'BundleBuilderPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
