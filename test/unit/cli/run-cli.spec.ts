import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type {
  DownloadModelCommand,
  DownloadModelPort,
  DownloadModelResult,
} from '../../../src/application/ports/input/download-model.port';
import { EXIT_FAILURE, EXIT_SUCCESS, runDownloads } from '../../../src/cli/run-cli';
import type { CliArguments } from '../../../src/cli/parse-cli-args';
import { TransferError } from '../../../src/domain/errors/downloader.errors';
import { summarizeFetch } from '../../../src/domain/value-objects/transfer-outcome.vo';
import { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import { createTestLogger } from '../helpers/test-factories';

function resultFor(command: DownloadModelCommand): DownloadModelResult {
  return {
    jobId: `job-${command.source}`,
    source: command.source,
    destination: command.outputDir,
    backend: 'model-hub',
    outcome: summarizeFetch('model-hub', []),
    lockAttempts: 1,
    waitedMs: 0,
    durationMs: 5,
  };
}

describe('runDownloads', () => {
  let logger: PinoLoggerService;
  let execute: Mock<DownloadModelPort['execute']>;
  let port: DownloadModelPort;

  const args: CliArguments = {
    sources: ['acme/first', 'acme/second', 'acme/third'],
    outputDir: '/data',
    modelName: 'llm',
    config: { hf_token: 'test-token' },
  };

  beforeEach(() => {
    logger = createTestLogger();
    execute = vi.fn<DownloadModelPort['execute']>(async (command) => resultFor(command));
    port = { execute };
  });

  it('should download every source in order and exit 0', async () => {
    const exitCode = await runDownloads(args, port, logger);

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(execute.mock.calls.map(([command]) => command.source)).toEqual([
      'acme/first',
      'acme/second',
      'acme/third',
    ]);
    expect(execute).toHaveBeenCalledWith(
      { source: 'acme/first', outputDir: '/data', modelName: 'llm', config: { hf_token: 'test-token' } },
      { signal: undefined },
    );
  });

  it('should stop at the first failure and exit 1', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    execute.mockImplementation(async (command) => {
      if (command.source === 'acme/second') {
        throw new TransferError('gated repository', 'ACCESS_DENIED');
      }
      return resultFor(command);
    });

    const exitCode = await runDownloads(args, port, logger);

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(execute).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(
      {
        source: 'acme/second',
        code: 'TRANSFER_FAILED',
        retryable: false,
        error: 'gated repository',
      },
      'Download failed',
    );
  });

  it('should hand the abort signal to every download', async () => {
    const controller = new AbortController();

    await runDownloads(args, port, logger, controller.signal);

    expect(execute.mock.calls.every(([, options]) => options?.signal === controller.signal)).toBe(true);
  });
});
