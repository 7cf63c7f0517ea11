import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppConfig, buildAppConfig } from '../../../src/config/configuration';
import type { DownloadConfig } from '../../../src/config/download-config.schema';
import { validateEnv } from '../../../src/config/validation.schema';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';

/**
 * Factories shared by the unit and acceptance specs.
 * Everything runs in process: real temp directories, no network.
 */

/**
 * ConfigService over the validated environment schema, with overrides
 * given as environment variables
 */
export function createTestConfig(env: Record<string, string> = {}): ConfigService<AppConfig> {
  return new ConfigService<AppConfig>(
    buildAppConfig(validateEnv({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...env })),
  );
}

export function createTestLogger(config: ConfigService<AppConfig> = createTestConfig()): PinoLoggerService {
  return new PinoLoggerService(config);
}

export function createDownloadConfig(overrides: Partial<DownloadConfig> = {}): DownloadConfig {
  return {
    accessKey: 'test-access-key',
    secretKey: 'test-secret',
    region: 'us-east-1',
    verifyChecksum: false,
    maxConcurrency: 4,
    ...overrides,
  };
}

export async function createTempDir(prefix = 'model-fetcher-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sets a file's mtime `ageMs` into the past
 */
export async function ageFile(path: string, ageMs: number): Promise<void> {
  const past = new Date(Date.now() - ageMs);
  await fs.utimes(path, past, past);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
