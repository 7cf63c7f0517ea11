import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { createInterface } from 'readline';
import type {
  OutputStream,
  VolumeSyncPort,
  VolumeSyncRequest,
  VolumeSyncResult,
} from '../../../application/ports/output/volume-sync.port';
import { AppConfig } from '../../../config/configuration';
import { TransferError } from '../../../domain/errors/downloader.errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * `rsync -av --partial --progress [--exclude=/<name>...] <src>/ <dest>/`
 *
 * Trailing slashes copy the directory's contents rather than the directory
 * itself. A leading `/` anchors each exclude at the transfer root.
 */
export function buildRsyncArgs(
  sourceDir: string,
  destinationDir: string,
  exclude: readonly string[] = [],
): string[] {
  return [
    '-av',
    '--partial',
    '--progress',
    ...exclude.map((name) => `--exclude=/${name}`),
    withTrailingSlash(sourceDir),
    withTrailingSlash(destinationDir),
  ];
}

function withTrailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`;
}

/**
 * Rsync Volume Sync Adapter
 * Implements VolumeSyncPort by running rsync as a child process and
 * forwarding its output line by line.
 */
@Injectable()
export class RsyncVolumeSyncAdapter implements VolumeSyncPort {
  private readonly binary: string;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly logger: PinoLoggerService,
  ) {
    this.binary = configService.get('sharedVolume', { infer: true })?.rsyncBinary ?? 'rsync';
    this.logger.setContext(RsyncVolumeSyncAdapter.name);
  }

  sync(request: VolumeSyncRequest): Promise<VolumeSyncResult> {
    const args = buildRsyncArgs(request.sourceDir, request.destinationDir, request.exclude);
    const emit = request.onOutput ?? ((line: string, stream: OutputStream) => this.forward(line, stream));
    const startedAt = Date.now();

    this.logger.info({ command: this.binary, args }, 'Starting volume sync');

    return new Promise<VolumeSyncResult>((resolve, reject) => {
      const child = spawn(this.binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      createInterface({ input: child.stdout }).on('line', (line) => emit(line, 'stdout'));
      createInterface({ input: child.stderr }).on('line', (line) => emit(line, 'stderr'));

      child.once('error', (error) => {
        reject(
          new TransferError(
            `Failed to run ${this.binary}: ${error.message}`,
            'COMMAND_FAILED',
            { command: this.binary, args },
            error,
          ),
        );
      });

      child.once('close', (code, signal) => {
        const durationMs = Date.now() - startedAt;

        if (code === 0) {
          this.logger.info({ command: this.binary, durationMs }, 'Volume sync finished');
          resolve({ exitCode: 0, durationMs });
          return;
        }

        reject(
          new TransferError(
            `${this.binary} exited with ${code !== null ? `code ${code}` : `signal ${signal}`}`,
            'COMMAND_FAILED',
            { command: this.binary, args, exitCode: code, signal, durationMs },
          ),
        );
      });
    });
  }

  private forward(line: string, stream: OutputStream): void {
    if (stream === 'stdout') {
      this.logger.info({ stream }, line);
    } else {
      this.logger.error({ stream }, line);
    }
  }
}
