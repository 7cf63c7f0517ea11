import type { LeaseState } from '../../../domain/value-objects/lease-state.vo';

/**
 * Lease timing. renewIntervalMs must stay well below timeoutMs (about half)
 * so a slow transfer never lets its own lease expire.
 */
export interface LeaseOptions {
  timeoutMs: number;
  renewIntervalMs: number;
  /** Upper bound on waiting for the renewal task to stop */
  renewJoinTimeoutMs: number;
}

/**
 * Lease Lock Port (Driven Port)
 * A self-expiring, advisory mutual-exclusion marker on a path
 */
export interface LeaseLockPort {
  readonly lockPath: string;

  /** In-process view; not re-read from the filesystem */
  readonly isLocked: boolean;

  readonly state: LeaseState;

  /**
   * Non-blocking. Resolves false when the lease is held elsewhere or the
   * attempt failed; never rejects. Starts renewal on success.
   */
  tryAcquire(): Promise<boolean>;

  /**
   * Heartbeat loop: refreshes the lock file's mtime every intervalMs until
   * the signal aborts. Started by tryAcquire; exposed for callers that
   * manage renewal themselves.
   */
  renew(intervalMs: number, signal: AbortSignal): Promise<void>;

  /**
   * Idempotent. Stops renewal before giving the lease up.
   */
  release(): Promise<void>;
}

export interface LeaseLockFactoryPort {
  create(lockPath: string, options?: Partial<LeaseOptions>): LeaseLockPort;
}
