/**
 * Application Configuration Module
 *
 * Loads and validates environment variables, providing type-safe access
 * to the downloader settings throughout the application.
 *
 * ## Configuration Sources:
 * 1. Environment variables (system environment or container spec)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const lease = this.configService.get('lease', { infer: true });
 * ```
 *
 * Per-job credentials passed on the command line take precedence over the
 * defaults below (see `download-config.schema.ts`).
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type LogLevel = EnvConfig['LOG_LEVEL'];

export interface AppConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  huggingface: {
    token?: string;
    endpoint?: string;
    revision?: string;
  };
  sharedVolume: {
    mountRoot: string;
    rsyncBinary: string;
  };
  /**
   * Lease settings.
   *
   * ### timeoutMs (LOCK_TIMEOUT_MS)
   * - Age after which an un-renewed lock file is considered abandoned
   * - Must comfortably exceed the longest pause between two renewals
   *
   * ### renewIntervalMs (LOCK_RENEW_INTERVAL_MS)
   * - Heartbeat cadence while a download runs; keep it near half the timeout
   *
   * ### pollIntervalMs (LOCK_POLL_INTERVAL_MS)
   * - How long a waiter sleeps between two acquisition attempts
   *
   * ### maxWaitMs (LOCK_MAX_WAIT_MS)
   * - Upper bound on the total wait for the lease; 0 waits forever
   */
  lease: {
    timeoutMs: number;
    renewIntervalMs: number;
    renewJoinTimeoutMs: number;
    pollIntervalMs: number;
    maxWaitMs: number;
    lockFileName: string;
  };
  transfer: {
    maxConcurrency: number;
    verifyChecksum: boolean;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    huggingface: {
      token: env.HF_TOKEN,
      endpoint: env.HF_ENDPOINT,
      revision: env.HF_REVISION,
    },
    sharedVolume: {
      mountRoot: env.PVC_MOUNT_ROOT,
      rsyncBinary: env.RSYNC_BINARY,
    },
    lease: {
      timeoutMs: env.LOCK_TIMEOUT_MS,
      renewIntervalMs: env.LOCK_RENEW_INTERVAL_MS,
      renewJoinTimeoutMs: env.LOCK_RENEW_JOIN_TIMEOUT_MS,
      pollIntervalMs: env.LOCK_POLL_INTERVAL_MS,
      maxWaitMs: env.LOCK_MAX_WAIT_MS,
      lockFileName: env.LOCK_FILE_NAME,
    },
    transfer: {
      maxConcurrency: env.TRANSFER_MAX_CONCURRENCY,
      verifyChecksum: env.TRANSFER_VERIFY_CHECKSUM,
    },
  };

  // Add AWS credentials only if both halves are provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
