// Export all in-memory adapters for easy import
export { InMemoryObjectStorageAdapter } from './in-memory-object-storage.adapter';
export { InMemoryModelHubAdapter } from './in-memory-model-hub.adapter';
export { InMemoryVolumeSyncAdapter } from './in-memory-volume-sync.adapter';
export { InMemoryEventPublisherAdapter } from './in-memory-event-publisher.adapter';
export { InMemoryLeaseLock, InMemoryLeaseLockFactory } from './in-memory-lease-lock.adapter';
