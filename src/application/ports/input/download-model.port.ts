import type { DownloadConfigInput } from '../../../config/download-config.schema';
import type { BackendKind } from '../../../domain/value-objects/backend-target.vo';
import type { FetchOutcome } from '../../../domain/value-objects/transfer-outcome.vo';

/**
 * Download Model Command
 */
export interface DownloadModelCommand {
  source: string;
  outputDir: string;
  /** Subdirectory of outputDir to download into; outputDir itself when absent */
  modelName?: string;
  config?: DownloadConfigInput;
}

export interface DownloadModelOptions {
  /** Cancels the wait for the lease; an in-flight fetch is not interrupted */
  signal?: AbortSignal;
}

/**
 * Download Model Result
 */
export interface DownloadModelResult {
  jobId: string;
  source: string;
  destination: string;
  backend: BackendKind;
  outcome: FetchOutcome;
  lockAttempts: number;
  waitedMs: number;
  durationMs: number;
}

/**
 * Download Model Port (Driving Port / Use Case Interface)
 * Fetches a source into a destination while holding the destination's lease
 */
export interface DownloadModelPort {
  execute(command: DownloadModelCommand, options?: DownloadModelOptions): Promise<DownloadModelResult>;
}
