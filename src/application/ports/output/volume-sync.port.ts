export type OutputStream = 'stdout' | 'stderr';

export interface VolumeSyncRequest {
  sourceDir: string;
  destinationDir: string;
  /** Top-level names left out of the copy */
  exclude?: readonly string[];
  onOutput?: (line: string, stream: OutputStream) => void;
}

export interface VolumeSyncResult {
  exitCode: number;
  durationMs: number;
}

/**
 * Volume Sync Port (Driven Port)
 * Recursive, incremental, resumable directory copy. Rejects with
 * TransferError(COMMAND_FAILED) on a non-zero exit.
 */
export interface VolumeSyncPort {
  sync(request: VolumeSyncRequest): Promise<VolumeSyncResult>;
}
