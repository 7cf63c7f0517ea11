import type { ObjectStoreProvider } from '../../../domain/value-objects/backend-target.vo';

export interface ObjectStorageConnection {
  provider: ObjectStoreProvider;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  endpoint?: string;
}

export interface RemoteObject {
  key: string;
  size: number;
  /** Quoted as returned by the store; single-part uploads carry the MD5 */
  etag?: string;
  lastModified?: Date;
}

export interface DownloadedObject {
  key: string;
  localPath: string;
  size: number;
  etag?: string;
}

/**
 * Object Storage Port (Driven Port)
 * Read side of an S3-compatible store. Implementations raise TransferError
 * with a kind that separates credential problems from network ones.
 */
export interface ObjectStoragePort {
  /**
   * Every object under a prefix, following pagination
   */
  listObjects(
    connection: ObjectStorageConnection,
    bucket: string,
    prefix: string,
  ): AsyncIterable<RemoteObject>;

  /**
   * Download one object to a local file path. The parent directory must exist.
   */
  downloadObject(
    connection: ObjectStorageConnection,
    bucket: string,
    key: string,
    destinationPath: string,
  ): Promise<DownloadedObject>;
}
