import { Injectable } from '@nestjs/common';
import { downloadFile, listFiles } from '@huggingface/hub';
import { promises as fs } from 'fs';
import { dirname, join, relative, resolve, sep } from 'path';
import type {
  ModelHubPort,
  SnapshotDownloadRequest,
  SnapshotDownloadResult,
} from '../../../application/ports/output/model-hub.port';
import {
  describeError,
  errorCodeOf,
  TransferError,
  type TransferErrorKind,
} from '../../../domain/errors/downloader.errors';
import type { ObjectTransferOutcome } from '../../../domain/value-objects/transfer-outcome.vo';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

const DEFAULT_REVISION = 'main';
const CHUNK_BYTES = 16 * 1024 * 1024;

interface BlobLike {
  readonly size: number;
  slice(start?: number, end?: number): { arrayBuffer(): Promise<ArrayBuffer> };
}

/**
 * Hugging Face Hub Adapter
 * Implements ModelHubPort with `@huggingface/hub`: the repository tree is
 * listed once and each file is streamed into place. Files whose local size
 * already matches the remote one are left alone, so re-running after an
 * interruption only fetches what is missing.
 */
@Injectable()
export class HuggingFaceHubAdapter implements ModelHubPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(HuggingFaceHubAdapter.name);
  }

  async snapshotDownload(request: SnapshotDownloadRequest): Promise<SnapshotDownloadResult> {
    const revision = request.revision ?? DEFAULT_REVISION;
    const common = {
      repo: request.repoId,
      revision,
      accessToken: request.token,
      hubUrl: request.endpoint,
    };

    this.logger.info(
      { repoId: request.repoId, revision, endpoint: request.endpoint, localDir: request.localDir },
      'Downloading hub snapshot',
    );

    const files: ObjectTransferOutcome[] = [];
    const excluded = new Set((request.exclude ?? []).map((name) => resolve(request.localDir, name)));

    try {
      for await (const entry of listFiles({ ...common, recursive: true })) {
        if (entry.type !== 'file') {
          continue;
        }

        const size = entry.lfs?.size ?? entry.size;
        const localPath = resolveInside(request.localDir, entry.path);
        if (excluded.has(localPath)) {
          this.logger.warn({ path: entry.path }, 'Skipping file that would replace the lock file');
          continue;
        }

        if (await hasSize(localPath, size)) {
          this.logger.debug({ path: entry.path, size }, 'File already present; skipping');
          files.push({ key: entry.path, localPath, status: 'skipped', bytes: size });
          continue;
        }

        const blob = await downloadFile({ ...common, path: entry.path });
        if (!blob) {
          throw new TransferError(
            `File ${entry.path} not found in ${request.repoId}@${revision}`,
            'NOT_FOUND',
            { repoId: request.repoId, revision, path: entry.path },
          );
        }

        await fs.mkdir(dirname(localPath), { recursive: true });
        const partial = `${localPath}.partial`;
        await writeBlob(blob, partial);
        await fs.rename(partial, localPath);

        this.logger.info({ path: entry.path, bytes: blob.size }, 'File downloaded');
        files.push({ key: entry.path, localPath, status: 'success', bytes: blob.size });
      }
    } catch (error) {
      if (error instanceof TransferError) {
        throw error;
      }
      throw new TransferError(
        `Hub snapshot of ${request.repoId}@${revision} failed: ${describeError(error)}`,
        classifyHubError(error),
        { repoId: request.repoId, revision },
        error,
      );
    }

    return { repoId: request.repoId, revision, files };
  }
}

export function classifyHubError(error: unknown): TransferErrorKind {
  const status =
    error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number'
      ? error.statusCode
      : undefined;

  if (status === 401 || status === 403) {
    return 'ACCESS_DENIED';
  }
  if (status === 404) {
    return 'NOT_FOUND';
  }

  // fetch() rejects with a TypeError whose cause carries the socket error
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCodeOf(cause) ?? errorCodeOf(error);
  if (error instanceof TypeError || (code !== undefined && code.startsWith('E'))) {
    return 'NETWORK';
  }
  return 'UNKNOWN';
}

function resolveInside(root: string, repoPath: string): string {
  const target = resolve(join(root, ...repoPath.split('/')));
  const rel = relative(resolve(root), target);
  if (rel.length === 0 || rel.startsWith(`..${sep}`) || rel === '..') {
    throw new TransferError(`Repository path escapes the destination: ${repoPath}`, 'UNKNOWN', {
      path: repoPath,
    });
  }
  return target;
}

async function hasSize(path: string, size: number): Promise<boolean> {
  try {
    return (await fs.stat(path)).size === size;
  } catch (error) {
    if (errorCodeOf(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Hub blobs are lazy; each slice is one range request.
 */
async function writeBlob(blob: BlobLike, path: string): Promise<void> {
  const handle = await fs.open(path, 'w');
  try {
    for (let offset = 0; offset < blob.size; offset += CHUNK_BYTES) {
      const chunk = await blob.slice(offset, offset + CHUNK_BYTES).arrayBuffer();
      await handle.write(new Uint8Array(chunk));
    }
  } finally {
    await handle.close();
  }
}
