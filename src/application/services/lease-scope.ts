import type { LeaseLockPort } from '../ports/output/lease-lock.port';
import { LockAcquisitionError } from '../../domain/errors/downloader.errors';

/**
 * Runs `fn` while holding the lease, or fails at once with
 * LockAcquisitionError when it is held elsewhere. The lease is released on
 * every exit path.
 */
export async function withLease<T>(lock: LeaseLockPort, fn: () => Promise<T>): Promise<T> {
  if (!(await lock.tryAcquire())) {
    throw new LockAcquisitionError(lock.lockPath);
  }

  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
