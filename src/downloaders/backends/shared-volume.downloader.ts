import { promises as fs } from 'fs';
import type { VolumeSyncPort } from '../../application/ports/output/volume-sync.port';
import { errorCodeOf, TransferError } from '../../domain/errors/downloader.errors';
import type { SharedVolumeTarget } from '../../domain/value-objects/backend-target.vo';
import { FetchOutcome, summarizeFetch } from '../../domain/value-objects/transfer-outcome.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type { FetchOptions, ModelDownloader } from '../interfaces/model-downloader.interface';

/**
 * Copies from a mounted volume with an incremental sync. The sync tool
 * reports progress as text only, so the outcome carries no per-file entries.
 */
export class SharedVolumeDownloader implements ModelDownloader {
  constructor(
    readonly target: SharedVolumeTarget,
    private readonly volumeSync: VolumeSyncPort,
    private readonly logger: PinoLoggerService,
  ) {}

  async fetch(destination: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { path } = this.target;

    await this.assertDirectory(path);

    this.logger.info({ path, destination }, 'Syncing from shared volume');

    const result = await this.volumeSync.sync({
      sourceDir: path,
      destinationDir: destination,
      exclude: options.reservedNames,
      onOutput: (line, stream) => {
        if (stream === 'stdout') {
          this.logger.info({ stream }, line);
        } else {
          this.logger.error({ stream }, line);
        }
      },
    });

    this.logger.info({ path, durationMs: result.durationMs }, 'Shared volume sync finished');

    return summarizeFetch('shared-volume', []);
  }

  private async assertDirectory(path: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(path)).isDirectory();
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        throw new TransferError(`Shared volume path does not exist: ${path}`, 'NOT_FOUND', { path }, error);
      }
      throw error;
    }

    if (!isDirectory) {
      throw new TransferError(`Shared volume path is not a directory: ${path}`, 'NOT_FOUND', { path });
    }
  }
}
