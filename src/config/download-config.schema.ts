import { z } from 'zod';
import { AppConfig } from './configuration';
import { ConfigValidationError } from '../domain/errors/downloader.errors';

/**
 * Per-job option bag as it arrives on the wire (CLI `--config` JSON blob).
 * Every key is optional; unset keys fall back to the environment defaults.
 * `obs_endpoint` and `region_name` are accepted as older spellings.
 */
export const downloadConfigSchema = z.object({
  access_key: z.string().min(1).optional(),
  secret_key: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  obs_endpoint: z.string().url().optional(),
  region: z.string().min(1).optional(),
  region_name: z.string().min(1).optional(),
  hf_token: z.string().min(1).optional(),
  hf_endpoint: z.string().url().optional(),
  hf_revision: z.string().min(1).optional(),
  verify_checksum: z.boolean().optional(),
  max_concurrency: z.number().int().min(1).max(64).optional(),
});

export type DownloadConfigInput = z.infer<typeof downloadConfigSchema>;

export interface DownloadConfig {
  accessKey?: string;
  secretKey?: string;
  endpoint?: string;
  region: string;
  hfToken?: string;
  hfEndpoint?: string;
  hfRevision?: string;
  verifyChecksum: boolean;
  maxConcurrency: number;
}

export function parseDownloadConfig(raw: unknown): DownloadConfigInput {
  const result = downloadConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigValidationError(`Invalid download config:\n  - ${issues.join('\n  - ')}`, issues);
  }

  return result.data;
}

export function parseDownloadConfigJson(json: string): DownloadConfigInput {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Download config is not valid JSON: ${message}`, [message]);
  }
  return parseDownloadConfig(raw);
}

export function resolveDownloadConfig(
  input: DownloadConfigInput,
  defaults: Pick<AppConfig, 'aws' | 'huggingface' | 'transfer'>,
): DownloadConfig {
  return {
    accessKey: input.access_key ?? defaults.aws.credentials?.accessKeyId,
    secretKey: input.secret_key ?? defaults.aws.credentials?.secretAccessKey,
    endpoint: input.endpoint ?? input.obs_endpoint ?? defaults.aws.endpoint,
    region: input.region ?? input.region_name ?? defaults.aws.region,
    hfToken: input.hf_token ?? defaults.huggingface.token,
    hfEndpoint: input.hf_endpoint ?? defaults.huggingface.endpoint,
    hfRevision: input.hf_revision ?? defaults.huggingface.revision,
    verifyChecksum: input.verify_checksum ?? defaults.transfer.verifyChecksum,
    maxConcurrency: input.max_concurrency ?? defaults.transfer.maxConcurrency,
  };
}
