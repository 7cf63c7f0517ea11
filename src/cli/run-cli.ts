import type { DownloadModelPort } from '../application/ports/input/download-model.port';
import { DownloaderError, describeError, errorCodeOf } from '../domain/errors/downloader.errors';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import type { CliArguments } from './parse-cli-args';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Downloads each source in order and stops at the first failure.
 * Resolves to the process exit code.
 */
export async function runDownloads(
  args: CliArguments,
  downloadModel: DownloadModelPort,
  logger: PinoLoggerService,
  signal?: AbortSignal,
): Promise<number> {
  for (const source of args.sources) {
    try {
      const result = await downloadModel.execute(
        {
          source,
          outputDir: args.outputDir,
          modelName: args.modelName,
          config: args.config,
        },
        { signal },
      );

      logger.info(
        {
          jobId: result.jobId,
          source: result.source,
          destination: result.destination,
          backend: result.backend,
          status: result.outcome.status,
          transferred: result.outcome.transferred,
          skipped: result.outcome.skipped,
          lockAttempts: result.lockAttempts,
          durationMs: result.durationMs,
        },
        'Model ready',
      );
    } catch (error) {
      logger.error(
        {
          source,
          code: error instanceof DownloaderError ? error.code : errorCodeOf(error),
          retryable: error instanceof DownloaderError ? error.retryable : undefined,
          error: describeError(error),
        },
        'Download failed',
      );
      return EXIT_FAILURE;
    }
  }

  return EXIT_SUCCESS;
}
