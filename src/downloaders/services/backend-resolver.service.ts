import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ModelHubPort } from '../../application/ports/output/model-hub.port';
import type { ObjectStoragePort } from '../../application/ports/output/object-storage.port';
import type { VolumeSyncPort } from '../../application/ports/output/volume-sync.port';
import {
  MODEL_HUB_PORT,
  OBJECT_STORAGE_PORT,
  VOLUME_SYNC_PORT,
} from '../../application/ports/tokens';
import { AppConfig } from '../../config/configuration';
import type { DownloadConfig } from '../../config/download-config.schema';
import {
  BackendResolutionError,
  CredentialError,
  describeError,
} from '../../domain/errors/downloader.errors';
import { BackendTarget, parseSource } from '../../domain/value-objects/backend-target.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { ModelHubDownloader } from '../backends/model-hub.downloader';
import { ObjectStoreDownloader } from '../backends/object-store.downloader';
import { SharedVolumeDownloader } from '../backends/shared-volume.downloader';
import type { ModelDownloader } from '../interfaces/model-downloader.interface';

/**
 * Backend Resolver
 * Turns a source identifier into a ready downloader. Resolution happens
 * once per job, before any filesystem or network work; every failure here
 * is final (BackendResolutionError, or CredentialError for missing keys).
 */
@Injectable()
export class BackendResolverService {
  private readonly mountRoot: string;

  constructor(
    configService: ConfigService<AppConfig>,
    @Inject(OBJECT_STORAGE_PORT) private readonly objectStorage: ObjectStoragePort,
    @Inject(MODEL_HUB_PORT) private readonly modelHub: ModelHubPort,
    @Inject(VOLUME_SYNC_PORT) private readonly volumeSync: VolumeSyncPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.mountRoot = configService.get('sharedVolume', { infer: true })?.mountRoot ?? '/';
    this.logger.setContext(BackendResolverService.name);
  }

  resolve(source: string, config: DownloadConfig, logger: PinoLoggerService = this.logger): ModelDownloader {
    const target = parseSource(source, { mountRoot: this.mountRoot });

    try {
      const downloader = this.build(target, config, logger);
      this.logger.debug({ source, backend: target.kind }, 'Backend resolved');
      return downloader;
    } catch (error) {
      if (error instanceof BackendResolutionError || error instanceof CredentialError) {
        throw error;
      }
      throw new BackendResolutionError(source, describeError(error), error);
    }
  }

  private build(target: BackendTarget, config: DownloadConfig, logger: PinoLoggerService): ModelDownloader {
    switch (target.kind) {
      case 'object-store':
        return new ObjectStoreDownloader(
          target,
          config,
          this.objectStorage,
          logger.child({ backend: target.kind }, ObjectStoreDownloader.name),
        );
      case 'model-hub':
        return new ModelHubDownloader(
          target,
          config,
          this.modelHub,
          logger.child({ backend: target.kind }, ModelHubDownloader.name),
        );
      case 'shared-volume':
        return new SharedVolumeDownloader(
          target,
          this.volumeSync,
          logger.child({ backend: target.kind }, SharedVolumeDownloader.name),
        );
      default:
        return assertNever(target);
    }
  }
}

function assertNever(target: never): never {
  throw new Error(`Unhandled backend target: ${JSON.stringify(target)}`);
}
