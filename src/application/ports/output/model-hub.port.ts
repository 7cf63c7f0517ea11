import type { ObjectTransferOutcome } from '../../../domain/value-objects/transfer-outcome.vo';

export interface SnapshotDownloadRequest {
  repoId: string;
  localDir: string;
  revision?: string;
  token?: string;
  /** Alternate hub endpoint (mirror) */
  endpoint?: string;
  /** Top-level paths of the repository that are not written locally */
  exclude?: readonly string[];
}

export interface SnapshotDownloadResult {
  repoId: string;
  revision: string;
  files: ObjectTransferOutcome[];
}

/**
 * Model Hub Port (Driven Port)
 * One call materializes a whole repository snapshot into a local directory.
 * Resuming partially downloaded files is the hub client's business.
 */
export interface ModelHubPort {
  snapshotDownload(request: SnapshotDownloadRequest): Promise<SnapshotDownloadResult>;
}
