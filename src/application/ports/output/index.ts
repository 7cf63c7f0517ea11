/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export type { LeaseLockPort, LeaseLockFactoryPort, LeaseOptions } from './lease-lock.port';
export type {
  ObjectStoragePort,
  ObjectStorageConnection,
  RemoteObject,
  DownloadedObject,
} from './object-storage.port';
export type {
  ModelHubPort,
  SnapshotDownloadRequest,
  SnapshotDownloadResult,
} from './model-hub.port';
export type {
  VolumeSyncPort,
  VolumeSyncRequest,
  VolumeSyncResult,
  OutputStream,
} from './volume-sync.port';
export type { EventPublisherPort } from './event-publisher.port';
