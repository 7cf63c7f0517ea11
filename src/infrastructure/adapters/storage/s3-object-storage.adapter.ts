import { Injectable } from '@nestjs/common';
import type {
  DownloadedObject,
  ObjectStorageConnection,
  ObjectStoragePort,
  RemoteObject,
} from '../../../application/ports/output/object-storage.port';
import {
  describeError,
  errorCodeOf,
  TransferError,
  type TransferErrorKind,
} from '../../../domain/errors/downloader.errors';
import { S3ConnectionOptions, S3Service } from '../../../shared/aws/s3/s3.service';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

const ACCESS_DENIED_CODES = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
]);
const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NotFound']);
const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'TimeoutError',
  'RequestTimeout',
  'NetworkingError',
]);

/**
 * S3 Object Storage Adapter
 * Implements ObjectStoragePort on the AWS SDK; OBS goes through the same
 * client with a custom endpoint.
 */
@Injectable()
export class S3ObjectStorageAdapter implements ObjectStoragePort {
  constructor(
    private readonly s3Service: S3Service,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(S3ObjectStorageAdapter.name);
  }

  async *listObjects(
    connection: ObjectStorageConnection,
    bucket: string,
    prefix: string,
  ): AsyncGenerator<RemoteObject> {
    this.logger.debug({ provider: connection.provider, bucket, prefix }, 'Listing objects');

    try {
      yield* this.s3Service.listObjects(toS3Connection(connection), bucket, prefix);
    } catch (error) {
      throw toTransferError(error, `Failed to list ${connection.provider}://${bucket}/${prefix}`, {
        bucket,
        prefix,
      });
    }
  }

  async downloadObject(
    connection: ObjectStorageConnection,
    bucket: string,
    key: string,
    destinationPath: string,
  ): Promise<DownloadedObject> {
    this.logger.debug({ bucket, key, destinationPath }, 'Downloading object');

    try {
      const result = await this.s3Service.downloadToFile(
        toS3Connection(connection),
        bucket,
        key,
        destinationPath,
      );

      return {
        key,
        localPath: result.filePath,
        size: result.size,
        etag: result.etag,
      };
    } catch (error) {
      throw toTransferError(error, `Failed to download ${connection.provider}://${bucket}/${key}`, {
        bucket,
        key,
      });
    }
  }
}

function toS3Connection(connection: ObjectStorageConnection): S3ConnectionOptions {
  return {
    region: connection.region,
    accessKeyId: connection.accessKeyId,
    secretAccessKey: connection.secretAccessKey,
    endpoint: connection.endpoint,
  };
}

/**
 * Maps an SDK or socket error onto a TransferError kind
 */
export function toTransferError(
  error: unknown,
  message: string,
  details: Record<string, unknown> = {},
): TransferError {
  if (error instanceof TransferError) {
    return error;
  }

  const kind = classifyStorageError(error);
  return new TransferError(`${message}: ${describeError(error)}`, kind, details, error);
}

export function classifyStorageError(error: unknown): TransferErrorKind {
  const name = error instanceof Error ? error.name : undefined;
  const code = errorCodeOf(error);
  const status = httpStatusOf(error);

  const matches = (codes: Set<string>) =>
    (name !== undefined && codes.has(name)) || (code !== undefined && codes.has(code));

  if (matches(ACCESS_DENIED_CODES) || status === 401 || status === 403) {
    return 'ACCESS_DENIED';
  }
  if (name === 'NoSuchBucket' || code === 'NoSuchBucket') {
    return 'NO_SUCH_BUCKET';
  }
  if (matches(NOT_FOUND_CODES) || status === 404) {
    return 'NOT_FOUND';
  }
  if (matches(NETWORK_CODES)) {
    return 'NETWORK';
  }
  return 'UNKNOWN';
}

function httpStatusOf(error: unknown): number | undefined {
  if (
    error &&
    typeof error === 'object' &&
    '$metadata' in error &&
    error.$metadata &&
    typeof error.$metadata === 'object' &&
    'httpStatusCode' in error.$metadata &&
    typeof error.$metadata.httpStatusCode === 'number'
  ) {
    return error.$metadata.httpStatusCode;
  }
  return undefined;
}
