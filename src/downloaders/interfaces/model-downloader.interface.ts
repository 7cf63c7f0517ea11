import type { BackendTarget } from '../../domain/value-objects/backend-target.vo';
import type { FetchOutcome } from '../../domain/value-objects/transfer-outcome.vo';

export interface FetchOptions {
  /** Top-level names in the destination the fetch must never write (the lease file) */
  reservedNames?: readonly string[];
}

/**
 * One backend's transfer logic, bound to a resolved target.
 * `fetch` assumes the caller already holds the destination's lease.
 */
export interface ModelDownloader {
  readonly target: BackendTarget;
  fetch(destination: string, options?: FetchOptions): Promise<FetchOutcome>;
}
