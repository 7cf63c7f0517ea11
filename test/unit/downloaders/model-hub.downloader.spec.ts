import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { ModelHubDownloader } from '../../../src/downloaders/backends/model-hub.downloader';
import { TransferError } from '../../../src/domain/errors/downloader.errors';
import type { ModelHubTarget } from '../../../src/domain/value-objects/backend-target.vo';
import { InMemoryModelHubAdapter } from '../../in-memory-adapters';
import {
  createDownloadConfig,
  createTempDir,
  createTestLogger,
  removeTempDir,
} from '../helpers/test-factories';

const TARGET: ModelHubTarget = { kind: 'model-hub', repoId: 'acme/tiny-model' };

describe('ModelHubDownloader', () => {
  let destination: string;
  let hub: InMemoryModelHubAdapter;

  beforeEach(async () => {
    destination = await createTempDir();
    hub = new InMemoryModelHubAdapter();
    hub.addRepo('acme/tiny-model', {
      'config.json': '{"hidden":4}',
      'tokenizer/vocab.txt': 'a\nb\nc\n',
    });
  });

  afterEach(async () => {
    await removeTempDir(destination);
  });

  it('should snapshot the repository into the destination', async () => {
    const downloader = new ModelHubDownloader(TARGET, createDownloadConfig(), hub, createTestLogger());

    const outcome = await downloader.fetch(destination);

    expect(outcome).toMatchObject({
      backend: 'model-hub',
      status: 'success',
      transferred: 2,
      skipped: 0,
      bytes: 18,
    });
    expect(await fs.readFile(join(destination, 'tokenizer', 'vocab.txt'), 'utf8')).toBe('a\nb\nc\n');
  });

  it('should pass token, endpoint and revision through', async () => {
    const config = createDownloadConfig({
      hfToken: 'test-token',
      hfEndpoint: 'https://hub.internal.example',
      hfRevision: 'v1.2',
    });
    const downloader = new ModelHubDownloader(TARGET, config, hub, createTestLogger());

    await downloader.fetch(destination);

    expect(hub.snapshots[0].request).toEqual({
      repoId: 'acme/tiny-model',
      localDir: destination,
      revision: 'v1.2',
      token: 'test-token',
      endpoint: 'https://hub.internal.example',
    });
  });

  it('should ask the hub to leave reserved names alone', async () => {
    hub.addRepo('acme/tiny-model', { 'config.json': '{}', '.lock': 'remote lock content\n' });
    const downloader = new ModelHubDownloader(TARGET, createDownloadConfig(), hub, createTestLogger());

    const outcome = await downloader.fetch(destination, { reservedNames: ['.lock'] });

    expect(hub.snapshots[0].request.exclude).toEqual(['.lock']);
    expect(outcome.transferred).toBe(1);
    expect((await fs.readdir(destination)).sort()).toEqual(['config.json']);
  });

  it('should work without a token', async () => {
    const config = createDownloadConfig({ hfToken: undefined });
    const downloader = new ModelHubDownloader(TARGET, config, hub, createTestLogger());

    await downloader.fetch(destination);

    expect(hub.snapshots[0].request.token).toBeUndefined();
  });

  it('should let hub errors through unchanged', async () => {
    const error = new TransferError('gated repository', 'ACCESS_DENIED');
    hub.failWith(error);
    const downloader = new ModelHubDownloader(TARGET, createDownloadConfig(), hub, createTestLogger());

    await expect(downloader.fetch(destination)).rejects.toBe(error);
  });

  it('should report a missing repository as NOT_FOUND', async () => {
    const target: ModelHubTarget = { kind: 'model-hub', repoId: 'acme/missing' };
    const downloader = new ModelHubDownloader(target, createDownloadConfig(), hub, createTestLogger());

    await expect(downloader.fetch(destination)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });
});
