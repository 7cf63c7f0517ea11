import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type {
  LeaseLockFactoryPort,
  LeaseLockPort,
  LeaseOptions,
} from '../../../application/ports/output/lease-lock.port';
import { AppConfig } from '../../../config/configuration';
import {
  ConfigValidationError,
  describeError,
  errorCodeOf,
  LockIOError,
} from '../../../domain/errors/downloader.errors';
import { LeaseState, LeaseStateVO } from '../../../domain/value-objects/lease-state.vo';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

export const DEFAULT_LEASE_OPTIONS: LeaseOptions = {
  timeoutMs: 600_000,
  renewIntervalMs: 300_000,
  renewJoinTimeoutMs: 1_000,
};

interface FileIdentity {
  dev: number;
  ino: number;
}

interface RenewalTask {
  controller: AbortController;
  task: Promise<void>;
}

/**
 * File Lease Lock
 * Implements LeaseLockPort with a lock file whose presence and mtime are the
 * whole protocol. The file is created with O_EXCL, so only one contender can
 * create it; an owner keeps it fresh by touching it, and a file older than
 * timeoutMs may be stolen by anyone.
 *
 * Clocks of all participants are assumed to agree (single host or tightly
 * synced NFS clients).
 */
export class FileLeaseLock implements LeaseLockPort {
  private readonly options: LeaseOptions;
  private leaseState = LeaseStateVO.unheld();
  private handle: FileHandle | null = null;
  private identity: FileIdentity | null = null;
  private renewal: RenewalTask | null = null;

  constructor(
    public readonly lockPath: string,
    private readonly logger: PinoLoggerService,
    options: Partial<LeaseOptions> = {},
  ) {
    this.options = { ...DEFAULT_LEASE_OPTIONS, ...options };

    if (this.options.renewIntervalMs >= this.options.timeoutMs) {
      throw new ConfigValidationError('Lease renew interval must be shorter than its timeout', [
        `renewIntervalMs (${this.options.renewIntervalMs}) >= timeoutMs (${this.options.timeoutMs})`,
      ]);
    }
  }

  get isLocked(): boolean {
    return this.leaseState.isHeld();
  }

  get state(): LeaseState {
    return this.leaseState.value;
  }

  async tryAcquire(): Promise<boolean> {
    if (this.leaseState.isHeld()) {
      return true;
    }
    if (!this.leaseState.isUnheld()) {
      return false;
    }

    this.transition(LeaseState.ACQUIRING);

    try {
      await fs.mkdir(dirname(this.lockPath), { recursive: true });

      if (!(await this.clearStaleLock())) {
        this.transition(LeaseState.UNHELD);
        return false;
      }

      if (!(await this.createLockFile())) {
        this.logger.debug({ lockPath: this.lockPath }, 'Lock file created by another process first');
        this.transition(LeaseState.UNHELD);
        return false;
      }

      this.transition(LeaseState.HELD);
      this.startRenewal();

      this.logger.info(
        { lockPath: this.lockPath, pid: process.pid, timeoutMs: this.options.timeoutMs },
        'Lease acquired',
      );
      return true;
    } catch (error) {
      this.logLockError(new LockIOError(this.lockPath, 'acquire', error));
      await this.discardLockFile().catch((cleanupError: unknown) => {
        this.logLockError(new LockIOError(this.lockPath, 'cleanup', cleanupError));
      });
      this.transition(LeaseState.UNHELD);
      return false;
    }
  }

  async release(): Promise<void> {
    if (!this.leaseState.isHeld()) {
      return;
    }

    this.transition(LeaseState.RELEASING);

    try {
      await this.stopRenewal();
      await this.discardLockFile();
      this.logger.info({ lockPath: this.lockPath }, 'Lease released');
    } catch (error) {
      this.logLockError(new LockIOError(this.lockPath, 'release', error));
    } finally {
      this.transition(LeaseState.UNHELD);
    }
  }

  async renew(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        throw error;
      }

      await this.touch();
    }
  }

  private async touch(): Promise<void> {
    const now = new Date();

    try {
      await fs.utimes(this.lockPath, now, now);
      this.logger.debug({ lockPath: this.lockPath }, 'Lease renewed');
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        // Recreating it could hand a second process the same lease
        this.logger.warn({ lockPath: this.lockPath }, 'Lock file disappeared while held; not recreating');
        return;
      }
      this.logLockError(new LockIOError(this.lockPath, 'renew', error));
    }
  }

  /**
   * Resolves true when the path is free to be created: either nothing is
   * there, or an expired lock was moved aside by this process.
   */
  private async clearStaleLock(): Promise<boolean> {
    let stats: { mtimeMs: number; dev: number; ino: number };
    try {
      stats = await fs.stat(this.lockPath);
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }

    const ageMs = Date.now() - stats.mtimeMs;
    if (ageMs < this.options.timeoutMs) {
      this.logger.debug({ lockPath: this.lockPath, ageMs }, 'Lease held elsewhere');
      return false;
    }

    this.logger.warn(
      { lockPath: this.lockPath, ageMs, timeoutMs: this.options.timeoutMs },
      'Lease expired; taking it over',
    );

    const aside = `${this.lockPath}.stale.${process.pid}.${randomBytes(4).toString('hex')}`;
    try {
      await fs.rename(this.lockPath, aside);
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        // Another contender moved it first
        return false;
      }
      throw error;
    }

    const moved = await fs.stat(aside);
    if (moved.dev !== stats.dev || moved.ino !== stats.ino) {
      // Replaced between stat and rename: this is a fresh lease, put it back
      await fs.link(aside, this.lockPath).catch((error: unknown) => {
        this.logger.warn(
          { lockPath: this.lockPath, error: describeError(error) },
          'Could not restore a lock file moved aside by mistake',
        );
      });
      await fs.rm(aside, { force: true });
      return false;
    }

    await fs.rm(aside, { force: true });
    return true;
  }

  private async createLockFile(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'wx', 0o600);
    } catch (error) {
      if (errorCodeOf(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }

    this.handle = handle;
    const stats = await handle.stat();
    this.identity = { dev: stats.dev, ino: stats.ino };

    await handle.writeFile(`${process.pid}\n`);
    await handle.chmod(0o600);
    await handle.sync();

    const now = new Date();
    await handle.utimes(now, now);

    return true;
  }

  /**
   * Closes the handle and removes the lock file, unless the file at the path
   * is no longer the one this instance created.
   */
  private async discardLockFile(): Promise<void> {
    const handle = this.handle;
    const identity = this.identity;
    this.handle = null;
    this.identity = null;

    if (handle) {
      await handle.close().catch((error: unknown) => {
        this.logger.warn(
          { lockPath: this.lockPath, error: describeError(error) },
          'Failed to close lock file handle',
        );
      });
    }

    if (!identity) {
      return;
    }

    try {
      const current = await fs.stat(this.lockPath);
      if (current.dev !== identity.dev || current.ino !== identity.ino) {
        this.logger.warn(
          { lockPath: this.lockPath },
          'Lock file now belongs to another process; leaving it in place',
        );
        return;
      }
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        this.logger.debug({ lockPath: this.lockPath }, 'Lock file already removed');
        return;
      }
      throw error;
    }
  }

  private startRenewal(): void {
    const controller = new AbortController();
    const task = this.renew(this.options.renewIntervalMs, controller.signal).catch(
      (error: unknown) => {
        this.logger.error(
          { lockPath: this.lockPath, error: describeError(error) },
          'Lease renewal stopped unexpectedly',
        );
      },
    );

    this.renewal = { controller, task };
  }

  private async stopRenewal(): Promise<void> {
    const renewal = this.renewal;
    this.renewal = null;
    if (!renewal) {
      return;
    }

    renewal.controller.abort();

    const joined = await Promise.race([
      renewal.task.then(() => true),
      sleep(this.options.renewJoinTimeoutMs, false, { ref: false }),
    ]);

    if (!joined) {
      this.logger.warn(
        { lockPath: this.lockPath, joinTimeoutMs: this.options.renewJoinTimeoutMs },
        'Lease renewal did not stop in time',
      );
    }
  }

  private transition(next: LeaseState): void {
    this.leaseState = this.leaseState.transitionTo(next);
  }

  private logLockError(error: LockIOError): void {
    this.logger.error(
      { lockPath: this.lockPath, code: error.code, details: error.details },
      error.message,
    );
  }
}

/**
 * Creates file leases with the timing from the `lease` config section
 */
@Injectable()
export class FileLeaseLockFactory implements LeaseLockFactoryPort {
  private readonly defaults: LeaseOptions;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    const lease = configService.get('lease', { infer: true });
    this.defaults = lease
      ? {
          timeoutMs: lease.timeoutMs,
          renewIntervalMs: lease.renewIntervalMs,
          renewJoinTimeoutMs: lease.renewJoinTimeoutMs,
        }
      : DEFAULT_LEASE_OPTIONS;

    this.logger.setContext(FileLeaseLockFactory.name);
  }

  create(lockPath: string, options: Partial<LeaseOptions> = {}): LeaseLockPort {
    return new FileLeaseLock(lockPath, this.logger.child({ lockPath }, FileLeaseLock.name), {
      ...this.defaults,
      ...options,
    });
  }
}
