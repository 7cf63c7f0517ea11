/**
 * Injection tokens binding output ports to their adapters
 */
export const LEASE_LOCK_FACTORY_PORT = 'LeaseLockFactoryPort';
export const OBJECT_STORAGE_PORT = 'ObjectStoragePort';
export const MODEL_HUB_PORT = 'ModelHubPort';
export const VOLUME_SYNC_PORT = 'VolumeSyncPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
