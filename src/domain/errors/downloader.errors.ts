/**
 * Downloader error taxonomy.
 *
 * Lock-layer errors are contained by the lease and reduced to a boolean;
 * everything raised by a backend reaches the caller unchanged.
 */

export type DownloaderErrorCode =
  | 'LOCK_ACQUISITION_FAILED'
  | 'LOCK_IO'
  | 'LOCK_WAIT_TIMEOUT'
  | 'DOWNLOAD_ABORTED'
  | 'BACKEND_RESOLUTION_FAILED'
  | 'CREDENTIALS_MISSING'
  | 'TRANSFER_FAILED'
  | 'CONFIG_INVALID';

export class DownloaderError extends Error {
  public readonly code: DownloaderErrorCode;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: DownloaderErrorCode,
    retryable: boolean,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.retryable = retryable;
    this.details = details;

    // Restore prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised by scoped acquisition when the lease is held elsewhere.
 * The polling orchestrator never surfaces it; it just tries again.
 */
export class LockAcquisitionError extends DownloaderError {
  constructor(lockPath: string) {
    super(`Failed to acquire lock: ${lockPath}`, 'LOCK_ACQUISITION_FAILED', true, { lockPath });
  }
}

export class LockIOError extends DownloaderError {
  constructor(lockPath: string, operation: string, cause: unknown) {
    super(
      `Lock ${operation} failed for ${lockPath}: ${describeError(cause)}`,
      'LOCK_IO',
      true,
      { lockPath, operation },
      { cause },
    );
  }
}

export class LockWaitTimeoutError extends DownloaderError {
  constructor(lockPath: string, waitedMs: number, attempts: number) {
    super(
      `Gave up waiting for lock ${lockPath} after ${waitedMs}ms (${attempts} attempts)`,
      'LOCK_WAIT_TIMEOUT',
      true,
      { lockPath, waitedMs, attempts },
    );
  }
}

export class DownloadAbortedError extends DownloaderError {
  constructor(lockPath: string, attempts: number) {
    super(`Download aborted while waiting for lock ${lockPath}`, 'DOWNLOAD_ABORTED', false, {
      lockPath,
      attempts,
    });
  }
}

export class BackendResolutionError extends DownloaderError {
  constructor(source: string, reason: string, cause?: unknown) {
    super(
      `Failed to initialize downloader for '${source}': ${reason}`,
      'BACKEND_RESOLUTION_FAILED',
      false,
      { source },
      { cause },
    );
  }
}

export class CredentialError extends DownloaderError {
  constructor(backend: string, missing: readonly string[]) {
    super(
      `Missing ${backend} credentials: ${missing.join(', ')}`,
      'CREDENTIALS_MISSING',
      false,
      { backend, missing: [...missing] },
    );
  }
}

export type TransferErrorKind =
  | 'ACCESS_DENIED'
  | 'NO_SUCH_BUCKET'
  | 'NOT_FOUND'
  | 'NETWORK'
  | 'COMMAND_FAILED'
  | 'UNKNOWN';

export class TransferError extends DownloaderError {
  public readonly kind: TransferErrorKind;

  constructor(
    message: string,
    kind: TransferErrorKind,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    // Credential and missing-resource problems will not fix themselves
    const retryable = kind === 'NETWORK' || kind === 'UNKNOWN';
    super(message, 'TRANSFER_FAILED', retryable, { kind, ...details }, { cause });
    this.kind = kind;
  }
}

export class ConfigValidationError extends DownloaderError {
  constructor(message: string, issues: readonly string[]) {
    super(message, 'CONFIG_INVALID', false, { issues: [...issues] });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCodeOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
