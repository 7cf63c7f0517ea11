import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ObjectStorageConnection } from '../../../src/application/ports/output/object-storage.port';
import {
  classifyStorageError,
  S3ObjectStorageAdapter,
  toTransferError,
} from '../../../src/infrastructure/adapters/storage/s3-object-storage.adapter';
import { TransferError } from '../../../src/domain/errors/downloader.errors';
import { S3Service } from '../../../src/shared/aws/s3/s3.service';
import { createTestLogger } from '../helpers/test-factories';

const CONNECTION: ObjectStorageConnection = {
  provider: 'obs',
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
  region: 'eu-west-1',
  endpoint: 'https://obs.example.com',
};

function sdkError(name: string, httpStatusCode?: number): Error {
  const error = new Error(`${name} from service`);
  error.name = name;
  return Object.assign(error, { $metadata: { httpStatusCode } });
}

function socketError(code: string): Error {
  return Object.assign(new Error(`socket ${code}`), { code });
}

async function drain<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('S3ObjectStorageAdapter', () => {
  let s3Service: S3Service;
  let adapter: S3ObjectStorageAdapter;

  beforeEach(() => {
    s3Service = new S3Service(createTestLogger());
    adapter = new S3ObjectStorageAdapter(s3Service, createTestLogger());
  });

  afterEach(() => {
    s3Service.onModuleDestroy();
  });

  describe('listObjects', () => {
    it('should yield the objects S3Service lists', async () => {
      // Arrange
      const listSpy = vi.spyOn(s3Service, 'listObjects').mockImplementation(async function* () {
        yield { key: 'llama/config.json', size: 12, etag: '"abc"' };
        yield { key: 'llama/weights.bin', size: 2048 };
      });

      // Act
      const objects = await drain(adapter.listObjects(CONNECTION, 'models', 'llama'));

      // Assert
      expect(objects.map((object) => object.key)).toEqual(['llama/config.json', 'llama/weights.bin']);
      expect(listSpy).toHaveBeenCalledWith(
        {
          region: 'eu-west-1',
          accessKeyId: 'test-access-key',
          secretAccessKey: 'test-secret',
          endpoint: 'https://obs.example.com',
        },
        'models',
        'llama',
      );
    });

    it('should map a missing bucket to NO_SUCH_BUCKET', async () => {
      vi.spyOn(s3Service, 'listObjects').mockImplementation(async function* () {
        throw sdkError('NoSuchBucket', 404);
      });

      await expect(drain(adapter.listObjects(CONNECTION, 'gone', 'llama'))).rejects.toMatchObject({
        kind: 'NO_SUCH_BUCKET',
        message: 'Failed to list obs://gone/llama: NoSuchBucket from service',
      });
    });
  });

  describe('downloadObject', () => {
    it('should return what S3Service wrote', async () => {
      vi.spyOn(s3Service, 'downloadToFile').mockResolvedValue({
        filePath: '/tmp/out/config.json.partial',
        size: 12,
        contentType: 'application/json',
        etag: '"abc"',
      });

      const result = await adapter.downloadObject(
        CONNECTION,
        'models',
        'llama/config.json',
        '/tmp/out/config.json.partial',
      );

      expect(result).toEqual({
        key: 'llama/config.json',
        localPath: '/tmp/out/config.json.partial',
        size: 12,
        etag: '"abc"',
      });
    });

    it('should wrap SDK failures as non-retryable ACCESS_DENIED', async () => {
      const cause = sdkError('AccessDenied', 403);
      vi.spyOn(s3Service, 'downloadToFile').mockRejectedValue(cause);

      const failure = adapter.downloadObject(CONNECTION, 'models', 'llama/config.json', '/tmp/x');

      await expect(failure).rejects.toBeInstanceOf(TransferError);
      await expect(failure).rejects.toMatchObject({
        kind: 'ACCESS_DENIED',
        retryable: false,
        cause,
        details: { kind: 'ACCESS_DENIED', bucket: 'models', key: 'llama/config.json' },
      });
    });
  });
});

describe('classifyStorageError', () => {
  it.each([
    ['AccessDenied', undefined, 'ACCESS_DENIED'],
    ['InvalidAccessKeyId', undefined, 'ACCESS_DENIED'],
    ['SignatureDoesNotMatch', undefined, 'ACCESS_DENIED'],
    ['UnknownError', 403, 'ACCESS_DENIED'],
    ['NoSuchBucket', 404, 'NO_SUCH_BUCKET'],
    ['NoSuchKey', 404, 'NOT_FOUND'],
    ['UnknownError', 404, 'NOT_FOUND'],
    ['TimeoutError', undefined, 'NETWORK'],
    ['InternalError', 500, 'UNKNOWN'],
  ] as const)('should classify %s (HTTP %s) as %s', (name, status, kind) => {
    expect(classifyStorageError(sdkError(name, status))).toBe(kind);
  });

  it('should classify socket failures as NETWORK', () => {
    expect(classifyStorageError(socketError('ECONNRESET'))).toBe('NETWORK');
    expect(classifyStorageError(socketError('ENOTFOUND'))).toBe('NETWORK');
  });

  it('should classify non-errors as UNKNOWN', () => {
    expect(classifyStorageError('boom')).toBe('UNKNOWN');
  });
});

describe('toTransferError', () => {
  it('should keep an existing TransferError as it is', () => {
    const error = new TransferError('already mapped', 'NOT_FOUND');

    expect(toTransferError(error, 'ignored')).toBe(error);
  });

  it('should mark network failures retryable', () => {
    const error = toTransferError(socketError('ETIMEDOUT'), 'Failed to download s3://models/a');

    expect(error.kind).toBe('NETWORK');
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Failed to download s3://models/a: socket ETIMEDOUT');
  });
});

describe('S3Service', () => {
  let s3Service: S3Service;

  beforeEach(() => {
    s3Service = new S3Service(createTestLogger());
  });

  afterEach(() => {
    s3Service.onModuleDestroy();
  });

  it('should reuse one client per connection', () => {
    const options = {
      region: 'us-east-1',
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    };

    expect(s3Service.getClient(options)).toBe(s3Service.getClient({ ...options }));
  });

  it('should build separate clients for different secrets or endpoints', () => {
    const options = {
      region: 'us-east-1',
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
    };
    const base = s3Service.getClient(options);

    expect(s3Service.getClient({ ...options, secretAccessKey: 'other-secret' })).not.toBe(base);
    expect(s3Service.getClient({ ...options, endpoint: 'https://obs.example.com' })).not.toBe(base);
  });
});
