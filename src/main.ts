#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { DownloadModelUseCase } from './application/use-cases';
import { CliCommand, parseCliArgs, USAGE } from './cli/parse-cli-args';
import { EXIT_FAILURE, EXIT_SUCCESS, runDownloads } from './cli/run-cli';
import { describeError } from './domain/errors/downloader.errors';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the NestJS application context and run the downloads
 * (no HTTP server; the process exits when the last source is done)
 */
async function bootstrap(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    return EXIT_FAILURE;
  }

  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return EXIT_SUCCESS;
  }

  // Create NestJS application context (no HTTP)
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Logger is transient-scoped, so it has to be resolved rather than fetched
  const logger = await app.resolve(PinoLoggerService);
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const downloadModel = app.get(DownloadModelUseCase);

  // First signal cancels any wait for the lease; a second one exits at once
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(EXIT_FAILURE);
    }
    logger.warn({ signal }, 'Received shutdown signal, cancelling');
    controller.abort();
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  logger.info(
    { pid: process.pid, sources: command.args.sources, outputDir: command.args.outputDir },
    'model-fetcher started',
  );

  try {
    return await runDownloads(command.args, downloadModel, logger, controller.signal);
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Failed to start model-fetcher:', error);
    process.exitCode = EXIT_FAILURE;
  },
);
