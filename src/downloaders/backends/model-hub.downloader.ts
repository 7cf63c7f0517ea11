import type { ModelHubPort } from '../../application/ports/output/model-hub.port';
import type { DownloadConfig } from '../../config/download-config.schema';
import type { ModelHubTarget } from '../../domain/value-objects/backend-target.vo';
import { FetchOutcome, summarizeFetch } from '../../domain/value-objects/transfer-outcome.vo';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type { FetchOptions, ModelDownloader } from '../interfaces/model-downloader.interface';

/**
 * Hands the whole repository to the hub client in one snapshot call.
 * A token is optional; public repositories download without one.
 */
export class ModelHubDownloader implements ModelDownloader {
  constructor(
    readonly target: ModelHubTarget,
    private readonly config: DownloadConfig,
    private readonly hub: ModelHubPort,
    private readonly logger: PinoLoggerService,
  ) {}

  async fetch(destination: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { repoId } = this.target;

    this.logger.info(
      {
        repoId,
        revision: this.config.hfRevision,
        endpoint: this.config.hfEndpoint,
        authenticated: Boolean(this.config.hfToken),
        destination,
      },
      'Fetching from model hub',
    );

    const result = await this.hub.snapshotDownload({
      repoId,
      localDir: destination,
      revision: this.config.hfRevision,
      token: this.config.hfToken,
      endpoint: this.config.hfEndpoint,
      exclude: options.reservedNames,
    });

    const outcome = summarizeFetch('model-hub', result.files);

    this.logger.info(
      {
        repoId,
        revision: result.revision,
        transferred: outcome.transferred,
        skipped: outcome.skipped,
        bytes: outcome.bytes,
      },
      'Model hub fetch finished',
    );

    return outcome;
  }
}
