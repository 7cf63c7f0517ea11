import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { GetObjectCommand, paginateListObjectsV2, S3Client } from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { createWriteStream, promises as fs } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface S3ConnectionOptions {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  /** S3-compatible endpoint (OBS, MinIO); path-style addressing is used with it */
  endpoint?: string;
}

export interface S3ObjectSummary {
  key: string;
  size: number;
  etag?: string;
  lastModified?: Date;
}

export interface DownloadResult {
  filePath: string;
  size: number;
  contentType?: string;
  etag?: string;
}

/**
 * S3 client access keyed by connection. Credentials arrive per download job,
 * so one client is kept per distinct endpoint/region/key pair.
 */
@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly clients: Map<string, S3Client> = new Map();

  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(S3Service.name);
  }

  getClient(connection: S3ConnectionOptions): S3Client {
    const cacheKey = this.cacheKeyFor(connection);
    let client = this.clients.get(cacheKey);

    if (!client) {
      client = new S3Client({
        region: connection.region,
        ...(connection.endpoint && { endpoint: connection.endpoint, forcePathStyle: true }),
        credentials: {
          accessKeyId: connection.accessKeyId,
          secretAccessKey: connection.secretAccessKey,
        },
      });
      this.clients.set(cacheKey, client);

      this.logger.debug(
        { region: connection.region, endpoint: connection.endpoint },
        'S3 client created',
      );
    }

    return client;
  }

  /**
   * Every object under a prefix, one ListObjectsV2 page at a time
   */
  async *listObjects(
    connection: S3ConnectionOptions,
    bucket: string,
    prefix: string,
  ): AsyncGenerator<S3ObjectSummary> {
    const paginator = paginateListObjectsV2(
      { client: this.getClient(connection), pageSize: 1000 },
      { Bucket: bucket, ...(prefix && { Prefix: prefix }) },
    );

    let page = 0;
    for await (const output of paginator) {
      page++;
      this.logger.debug({ bucket, prefix, page, keyCount: output.KeyCount }, 'Listed objects page');

      for (const object of output.Contents ?? []) {
        if (!object.Key) {
          continue;
        }
        yield {
          key: object.Key,
          size: object.Size ?? 0,
          etag: object.ETag,
          lastModified: object.LastModified,
        };
      }
    }
  }

  async downloadToFile(
    connection: S3ConnectionOptions,
    bucket: string,
    key: string,
    destPath: string,
  ): Promise<DownloadResult> {
    const response = await this.getClient(connection).send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    if (!(response.Body instanceof Readable)) {
      throw new Error(`Object ${bucket}/${key} returned no readable body`);
    }

    await pipeline(response.Body, createWriteStream(destPath));

    const stats = await fs.stat(destPath);

    this.logger.debug({ bucket, key, destPath, size: stats.size }, 'Object downloaded');

    return {
      filePath: destPath,
      size: stats.size,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  private cacheKeyFor(connection: S3ConnectionOptions): string {
    const secret = createHash('sha256').update(connection.secretAccessKey).digest('hex');
    return [connection.region, connection.endpoint ?? '', connection.accessKeyId, secret].join('|');
  }

  onModuleDestroy() {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}
