import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import type {
  DownloadModelCommand,
  DownloadModelOptions,
  DownloadModelPort,
  DownloadModelResult,
} from '../ports/input/download-model.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import type { LeaseLockFactoryPort, LeaseLockPort } from '../ports/output/lease-lock.port';
import { EVENT_PUBLISHER_PORT, LEASE_LOCK_FACTORY_PORT } from '../ports/tokens';
import { AppConfig } from '../../config/configuration';
import { parseDownloadConfig, resolveDownloadConfig } from '../../config/download-config.schema';
import { DownloadJobEntity } from '../../domain/entities/download-job.entity';
import {
  DownloadAbortedError,
  DownloaderError,
  describeError,
  errorCodeOf,
  LockWaitTimeoutError,
} from '../../domain/errors/downloader.errors';
import {
  DownloadCompletedEvent,
  DownloadFailedEvent,
  DownloadStartedEvent,
} from '../../domain/events';
import type { FetchOutcome } from '../../domain/value-objects/transfer-outcome.vo';
import { BackendResolverService } from '../../downloaders/services/backend-resolver.service';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

interface LeaseWait {
  attempts: number;
  waitedMs: number;
}

/**
 * Download Model Use Case
 *
 * Resolves the backend, then polls the destination's lease at a fixed
 * cadence until it is free. The holder fetches while the lease renews in
 * the background, and gives the lease up whether the fetch succeeds or not.
 *
 * Waiters are not queued; whichever process polls first after a release
 * wins. A fetch is never retried here: backend errors reach the caller as
 * they were thrown.
 */
@Injectable()
export class DownloadModelUseCase implements DownloadModelPort {
  private readonly lease: AppConfig['lease'];
  private readonly defaults: Pick<AppConfig, 'aws' | 'huggingface' | 'transfer'>;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly resolver: BackendResolverService,
    @Inject(LEASE_LOCK_FACTORY_PORT) private readonly leaseLocks: LeaseLockFactoryPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.lease = configService.getOrThrow('lease', { infer: true });
    this.defaults = {
      aws: configService.getOrThrow('aws', { infer: true }),
      huggingface: configService.getOrThrow('huggingface', { infer: true }),
      transfer: configService.getOrThrow('transfer', { infer: true }),
    };
    this.logger.setContext(DownloadModelUseCase.name);
  }

  async execute(
    command: DownloadModelCommand,
    options: DownloadModelOptions = {},
  ): Promise<DownloadModelResult> {
    const startedAt = Date.now();
    const jobId = uuidv4();
    const log = this.logger.withJobId(jobId, DownloadModelUseCase.name);

    const config = resolveDownloadConfig(parseDownloadConfig(command.config ?? {}), this.defaults);
    const downloader = this.resolver.resolve(command.source, config, log);

    const job = DownloadJobEntity.create({
      jobId,
      source: command.source,
      outputDir: command.outputDir,
      modelName: command.modelName,
      target: downloader.target,
      config,
    });

    log.info(DownloadJobEntity.toJSON(job), 'Download requested');

    await fs.mkdir(job.destination, { recursive: true });

    const lock = this.leaseLocks.create(DownloadJobEntity.lockPath(job, this.lease.lockFileName));
    const wait = await this.acquireLease(lock, log, options.signal);

    log.info(
      { lockPath: lock.lockPath, attempts: wait.attempts, waitedMs: wait.waitedMs },
      'Lease held; starting fetch',
    );
    this.eventPublisher.publishAsync(
      new DownloadStartedEvent({
        jobId,
        source: job.source,
        destination: job.destination,
        backend: job.target.kind,
        lockAttempts: wait.attempts,
      }),
    );

    let outcome: FetchOutcome;
    try {
      outcome = await downloader.fetch(job.destination, {
        reservedNames: [this.lease.lockFileName],
      });
    } catch (error) {
      await lock.release();

      const durationMs = Date.now() - startedAt;
      log.error(
        {
          code: error instanceof DownloaderError ? error.code : errorCodeOf(error),
          error: describeError(error),
          durationMs,
        },
        'Download failed',
      );
      this.eventPublisher.publishAsync(
        new DownloadFailedEvent({
          jobId,
          source: job.source,
          destination: job.destination,
          backend: job.target.kind,
          errorCode: error instanceof DownloaderError ? error.code : errorCodeOf(error) ?? 'UNKNOWN',
          errorMessage: describeError(error),
          durationMs,
        }),
      );
      throw error;
    }

    await lock.release();

    const durationMs = Date.now() - startedAt;
    log.info(
      {
        status: outcome.status,
        transferred: outcome.transferred,
        skipped: outcome.skipped,
        bytes: outcome.bytes,
        durationMs,
      },
      'Download completed',
    );
    this.eventPublisher.publishAsync(
      new DownloadCompletedEvent({
        jobId,
        source: job.source,
        destination: job.destination,
        backend: job.target.kind,
        status: outcome.status,
        transferred: outcome.transferred,
        skipped: outcome.skipped,
        bytes: outcome.bytes,
        durationMs,
      }),
    );

    return {
      jobId,
      source: job.source,
      destination: job.destination,
      backend: job.target.kind,
      outcome,
      lockAttempts: wait.attempts,
      waitedMs: wait.waitedMs,
      durationMs,
    };
  }

  private async acquireLease(
    lock: LeaseLockPort,
    log: PinoLoggerService,
    signal?: AbortSignal,
  ): Promise<LeaseWait> {
    const { pollIntervalMs, maxWaitMs } = this.lease;
    const startedAt = Date.now();
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new DownloadAbortedError(lock.lockPath, attempts);
      }

      attempts++;
      if (await lock.tryAcquire()) {
        return { attempts, waitedMs: Date.now() - startedAt };
      }

      const waitedMs = Date.now() - startedAt;
      if (maxWaitMs > 0 && waitedMs >= maxWaitMs) {
        throw new LockWaitTimeoutError(lock.lockPath, waitedMs, attempts);
      }

      const delayMs = maxWaitMs > 0 ? Math.min(pollIntervalMs, maxWaitMs - waitedMs) : pollIntervalMs;
      log.info(
        { lockPath: lock.lockPath, attempts, waitedMs, retryInMs: delayMs },
        'Lease held by another process; waiting',
      );

      try {
        await sleep(delayMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw new DownloadAbortedError(lock.lockPath, attempts);
        }
        throw error;
      }
    }
  }
}
