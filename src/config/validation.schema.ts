import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Object storage defaults (S3 / OBS)
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(),

    // Model hub defaults
    HF_TOKEN: z.string().optional(),
    HF_ENDPOINT: z.string().url().optional(),
    HF_REVISION: z.string().optional(),

    // Shared volume
    PVC_MOUNT_ROOT: z.string().default('/'),
    RSYNC_BINARY: z.string().default('rsync'),

    // Lease
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(600000),
    LOCK_RENEW_INTERVAL_MS: z.coerce.number().int().positive().default(300000),
    LOCK_RENEW_JOIN_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
    LOCK_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
    LOCK_MAX_WAIT_MS: z.coerce.number().int().min(0).default(0), // 0 = wait forever
    LOCK_FILE_NAME: z.string().min(1).default('.lock'),

    // Transfers
    TRANSFER_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
    TRANSFER_VERIFY_CHECKSUM: booleanFromEnv.default('false'),
  })
  .refine((env) => env.LOCK_RENEW_INTERVAL_MS < env.LOCK_TIMEOUT_MS, {
    message: 'LOCK_RENEW_INTERVAL_MS must be shorter than LOCK_TIMEOUT_MS',
    path: ['LOCK_RENEW_INTERVAL_MS'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
