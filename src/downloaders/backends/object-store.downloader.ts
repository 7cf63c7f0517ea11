import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import { dirname, join, posix, relative, resolve, sep } from 'path';
import type {
  ObjectStorageConnection,
  ObjectStoragePort,
  RemoteObject,
} from '../../application/ports/output/object-storage.port';
import type { DownloadConfig } from '../../config/download-config.schema';
import {
  BackendResolutionError,
  CredentialError,
  describeError,
  errorCodeOf,
  TransferError,
} from '../../domain/errors/downloader.errors';
import { describeTarget, type ObjectStoreTarget } from '../../domain/value-objects/backend-target.vo';
import {
  FetchOutcome,
  ObjectTransferOutcome,
  summarizeFetch,
} from '../../domain/value-objects/transfer-outcome.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type { FetchOptions, ModelDownloader } from '../interfaces/model-downloader.interface';

const MD5_ETAG = /^[0-9a-f]{32}$/i;

/**
 * Object Store Downloader
 * Mirrors every object under `bucket/prefix` into the destination, keeping
 * the key layout below the prefix. Objects already present with the same
 * size (and MD5, when verification is on and the ETag is a plain MD5) are
 * skipped.
 *
 * Downloads land in `<file>.partial` and are renamed into place, so a file
 * at its final path is always complete.
 */
export class ObjectStoreDownloader implements ModelDownloader {
  private readonly connection: ObjectStorageConnection;
  private readonly maxConcurrency: number;
  private readonly verifyChecksum: boolean;

  constructor(
    readonly target: ObjectStoreTarget,
    config: DownloadConfig,
    private readonly storage: ObjectStoragePort,
    private readonly logger: PinoLoggerService,
  ) {
    const { accessKey, secretKey } = config;
    if (!accessKey || !secretKey) {
      const missing: string[] = [];
      if (!accessKey) missing.push('access_key');
      if (!secretKey) missing.push('secret_key');
      throw new CredentialError(target.provider, missing);
    }

    if (target.provider === 'obs' && !config.endpoint) {
      throw new BackendResolutionError(describeTarget(target), 'obs sources require an endpoint');
    }

    this.connection = {
      provider: target.provider,
      accessKeyId: accessKey,
      secretAccessKey: secretKey,
      region: config.region,
      endpoint: config.endpoint,
    };
    this.maxConcurrency = Math.max(1, config.maxConcurrency);
    this.verifyChecksum = config.verifyChecksum;
  }

  async fetch(destination: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { bucket, prefix } = this.target;
    const label = describeTarget(this.target);
    const reserved = new Set((options.reservedNames ?? []).map((name) => resolve(destination, name)));

    this.logger.info(
      { source: label, destination, endpoint: this.connection.endpoint },
      'Listing objects',
    );

    const objects: RemoteObject[] = [];
    for await (const object of this.storage.listObjects(this.connection, bucket, prefix)) {
      // Directory markers
      if (object.key.endsWith('/')) {
        continue;
      }
      if (reserved.has(this.localPathFor(object.key, destination))) {
        this.logger.warn({ key: object.key }, 'Skipping object that would replace the lock file');
        continue;
      }
      objects.push(object);
    }

    if (objects.length === 0) {
      this.logger.warn({ source: label }, 'No objects found under prefix');
      return summarizeFetch('object-store', []);
    }

    this.logger.info(
      { source: label, objects: objects.length, concurrency: this.maxConcurrency },
      'Transferring objects',
    );

    const outcomes = await this.transferAll(objects, destination);
    const summary = summarizeFetch('object-store', outcomes);

    this.logger.info(
      {
        source: label,
        transferred: summary.transferred,
        skipped: summary.skipped,
        bytes: summary.bytes,
      },
      'Object store fetch finished',
    );

    return summary;
  }

  /**
   * Shared-index worker pool. After the first failure no new object is
   * started; objects already in flight finish before the error is thrown.
   */
  private async transferAll(
    objects: readonly RemoteObject[],
    destination: string,
  ): Promise<ObjectTransferOutcome[]> {
    const outcomes: ObjectTransferOutcome[] = new Array(objects.length);
    const state: { next: number; failure?: { error: unknown } } = { next: 0 };

    const worker = async (): Promise<void> => {
      while (!state.failure && state.next < objects.length) {
        const index = state.next++;
        const object = objects[index];

        try {
          outcomes[index] = await this.transferOne(object, destination);
        } catch (error) {
          this.logger.error(
            {
              key: object.key,
              kind: error instanceof TransferError ? error.kind : undefined,
              error: describeError(error),
            },
            'Object transfer failed',
          );
          state.failure ??= { error };
        }
      }
    };

    const workers = Math.min(this.maxConcurrency, objects.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (state.failure) {
      throw state.failure.error;
    }
    return outcomes;
  }

  private async transferOne(object: RemoteObject, destination: string): Promise<ObjectTransferOutcome> {
    const localPath = this.localPathFor(object.key, destination);

    if (await this.isPresent(object, localPath)) {
      this.logger.debug({ key: object.key, size: object.size }, 'Object already present; skipping');
      return { key: object.key, localPath, status: 'skipped', bytes: object.size };
    }

    await fs.mkdir(dirname(localPath), { recursive: true });
    const partialPath = `${localPath}.partial`;

    try {
      const downloaded = await this.storage.downloadObject(
        this.connection,
        this.target.bucket,
        object.key,
        partialPath,
      );
      await fs.rename(partialPath, localPath);

      this.logger.info({ key: object.key, bytes: downloaded.size }, 'Object downloaded');
      return { key: object.key, localPath, status: 'success', bytes: downloaded.size };
    } catch (error) {
      await fs.rm(partialPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(
          { path: partialPath, error: describeError(cleanupError) },
          'Failed to remove partial download',
        );
      });
      throw error;
    }
  }

  /**
   * Key path below the prefix. A prefix that stops mid-name (`models/ll`)
   * keeps the last partial segment (`llama/...`).
   */
  private localPathFor(key: string, destination: string): string {
    const prefix = this.target.prefix.replace(/\/+$/, '');
    let rel = prefix ? posix.relative(prefix, key) : key;

    if (rel === '') {
      // The prefix names a single object
      rel = posix.basename(key);
    } else if (rel === '..' || rel.startsWith('../')) {
      rel = posix.relative(posix.dirname(prefix), key);
    }

    const root = resolve(destination);
    const localPath = resolve(join(root, ...rel.split('/')));
    const inside = relative(root, localPath);
    if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`)) {
      throw new TransferError(`Object key escapes the destination: ${key}`, 'UNKNOWN', { key });
    }
    return localPath;
  }

  private async isPresent(object: RemoteObject, localPath: string): Promise<boolean> {
    let size: number;
    try {
      size = (await fs.stat(localPath)).size;
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }

    if (size !== object.size) {
      return false;
    }
    if (!this.verifyChecksum) {
      return true;
    }

    // Multipart ETags (`<md5>-<parts>`) are not a content hash
    const expected = singlePartMd5(object.etag);
    if (!expected) {
      return true;
    }

    return (await md5OfFile(localPath)) === expected;
  }
}

export function singlePartMd5(etag: string | undefined): string | undefined {
  const value = etag?.replace(/"/g, '');
  return value && MD5_ETAG.test(value) ? value.toLowerCase() : undefined;
}

async function md5OfFile(path: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
