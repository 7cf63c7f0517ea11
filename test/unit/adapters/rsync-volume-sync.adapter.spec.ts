import { describe, it, expect, vi } from 'vitest';
import type { OutputStream } from '../../../src/application/ports/output/volume-sync.port';
import {
  buildRsyncArgs,
  RsyncVolumeSyncAdapter,
} from '../../../src/infrastructure/adapters/volume/rsync-volume-sync.adapter';
import { createTestConfig, createTestLogger } from '../helpers/test-factories';

function adapterWithBinary(binary: string) {
  const config = createTestConfig({ RSYNC_BINARY: binary });
  const logger = createTestLogger(config);
  return { adapter: new RsyncVolumeSyncAdapter(config, logger), logger };
}

describe('buildRsyncArgs', () => {
  it('should sync directory contents with partial transfers kept', () => {
    expect(buildRsyncArgs('/mnt/models/llama', '/data/llama')).toEqual([
      '-av',
      '--partial',
      '--progress',
      '/mnt/models/llama/',
      '/data/llama/',
    ]);
  });

  it('should anchor excluded names at the transfer root', () => {
    expect(buildRsyncArgs('/mnt/models/llama', '/data/llama', ['.lock'])).toEqual([
      '-av',
      '--partial',
      '--progress',
      '--exclude=/.lock',
      '/mnt/models/llama/',
      '/data/llama/',
    ]);
  });

  it('should not double a trailing slash', () => {
    expect(buildRsyncArgs('/src/', '/dst/').slice(3)).toEqual(['/src/', '/dst/']);
  });
});

describe('RsyncVolumeSyncAdapter', () => {
  it('should stream each output line to the callback', async () => {
    // echo prints the arguments it was given
    const { adapter } = adapterWithBinary('echo');
    const lines: Array<[string, OutputStream]> = [];

    const result = await adapter.sync({
      sourceDir: '/src',
      destinationDir: '/dst',
      onOutput: (line, stream) => lines.push([line, stream]),
    });

    expect(result.exitCode).toBe(0);
    expect(lines).toEqual([['-av --partial --progress /src/ /dst/', 'stdout']]);
  });

  it('should pass excluded names to the command', async () => {
    const { adapter } = adapterWithBinary('echo');
    const lines: string[] = [];

    await adapter.sync({
      sourceDir: '/src',
      destinationDir: '/dst',
      exclude: ['.lock'],
      onOutput: (line) => lines.push(line),
    });

    expect(lines).toEqual(['-av --partial --progress --exclude=/.lock /src/ /dst/']);
  });

  it('should log output when no callback is given', async () => {
    const { adapter, logger } = adapterWithBinary('echo');
    const infoSpy = vi.spyOn(logger, 'info');

    await adapter.sync({ sourceDir: '/src', destinationDir: '/dst' });

    expect(infoSpy).toHaveBeenCalledWith(
      { stream: 'stdout' },
      '-av --partial --progress /src/ /dst/',
    );
  });

  it('should fail with COMMAND_FAILED on a non-zero exit', async () => {
    const { adapter } = adapterWithBinary('false');

    await expect(adapter.sync({ sourceDir: '/src', destinationDir: '/dst' })).rejects.toMatchObject({
      kind: 'COMMAND_FAILED',
      retryable: false,
      message: 'false exited with code 1',
    });
  });

  it('should fail with COMMAND_FAILED when the binary cannot be started', async () => {
    const { adapter } = adapterWithBinary('model-fetcher-no-such-rsync');

    await expect(adapter.sync({ sourceDir: '/src', destinationDir: '/dst' })).rejects.toMatchObject({
      kind: 'COMMAND_FAILED',
      details: { command: 'model-fetcher-no-such-rsync' },
    });
  });
});
