/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no dependency on NestJS or on any storage client.
 */

// Entities
export { DownloadJobEntity } from './entities/download-job.entity';

// Value Objects
export {
  parseSource,
  describeTarget,
  type BackendTarget,
  type BackendKind,
  type ObjectStoreTarget,
  type ObjectStoreProvider,
  type ModelHubTarget,
  type SharedVolumeTarget,
  type ParseSourceOptions,
} from './value-objects/backend-target.vo';
export { LeaseState, LeaseStateVO } from './value-objects/lease-state.vo';
export {
  summarizeFetch,
  type FetchOutcome,
  type ObjectTransferOutcome,
  type TransferStatus,
} from './value-objects/transfer-outcome.vo';

// Errors
export * from './errors/downloader.errors';

// Events
export * from './events';
