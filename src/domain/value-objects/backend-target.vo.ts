import { posix } from 'path';
import { BackendResolutionError } from '../errors/downloader.errors';

/**
 * Backend Target
 * Closed set of places a model can be fetched from, parsed once from the
 * source identifier.
 *
 *   s3://bucket/prefix   → object-store (s3)
 *   obs://bucket/prefix  → object-store (obs, S3-compatible)
 *   pvc://some/dir       → shared-volume rooted at <mountRoot>/some/dir
 *   hf://org/name        → model-hub
 *   org/name             → model-hub (no scheme)
 */
export type ObjectStoreProvider = 's3' | 'obs';

export interface ObjectStoreTarget {
  readonly kind: 'object-store';
  readonly provider: ObjectStoreProvider;
  readonly bucket: string;
  readonly prefix: string;
}

export interface ModelHubTarget {
  readonly kind: 'model-hub';
  readonly repoId: string;
}

export interface SharedVolumeTarget {
  readonly kind: 'shared-volume';
  readonly path: string;
}

export type BackendTarget = ObjectStoreTarget | ModelHubTarget | SharedVolumeTarget;

export type BackendKind = BackendTarget['kind'];

export interface ParseSourceOptions {
  /** Directory that `pvc://` paths are resolved against (default `/`) */
  mountRoot?: string;
}

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(.*)$/;
const REPO_ID_PATTERN = /^[\w.-]+(\/[\w.-]+)?$/;

export function parseSource(source: string, options: ParseSourceOptions = {}): BackendTarget {
  const trimmed = source.trim();
  if (trimmed.length === 0) {
    throw new BackendResolutionError(source, 'source is empty');
  }

  const match = SCHEME_PATTERN.exec(trimmed);
  if (!match) {
    return modelHubTarget(source, trimmed);
  }

  const scheme = match[1].toLowerCase();
  const rest = match[2];

  switch (scheme) {
    case 's3':
    case 'obs':
      return objectStoreTarget(source, scheme, rest);
    case 'pvc':
      return sharedVolumeTarget(source, rest, options.mountRoot ?? '/');
    case 'hf':
      return modelHubTarget(source, rest);
    default:
      throw new BackendResolutionError(source, `unsupported scheme '${scheme}://'`);
  }
}

export function describeTarget(target: BackendTarget): string {
  switch (target.kind) {
    case 'object-store':
      return `${target.provider}://${target.bucket}/${target.prefix}`;
    case 'model-hub':
      return `hub:${target.repoId}`;
    case 'shared-volume':
      return `volume:${target.path}`;
  }
}

function objectStoreTarget(
  source: string,
  provider: ObjectStoreProvider,
  rest: string,
): ObjectStoreTarget {
  const slash = rest.indexOf('/');
  const bucket = slash < 0 ? rest : rest.slice(0, slash);
  const prefix = slash < 0 ? '' : rest.slice(slash + 1).replace(/^\/+/, '');

  if (bucket.length === 0) {
    throw new BackendResolutionError(source, 'bucket name is missing');
  }

  return { kind: 'object-store', provider, bucket, prefix };
}

function sharedVolumeTarget(source: string, rest: string, mountRoot: string): SharedVolumeTarget {
  const relative = rest.replace(/^\/+|\/+$/g, '');
  if (relative.length === 0) {
    throw new BackendResolutionError(source, 'volume path is missing');
  }

  const path = posix.join(mountRoot, relative);
  if (!path.startsWith(posix.join(mountRoot, '/'))) {
    throw new BackendResolutionError(source, `volume path escapes mount root ${mountRoot}`);
  }

  return { kind: 'shared-volume', path };
}

function modelHubTarget(source: string, repoId: string): ModelHubTarget {
  if (!REPO_ID_PATTERN.test(repoId)) {
    throw new BackendResolutionError(source, `'${repoId}' is not a valid repository id`);
  }
  return { kind: 'model-hub', repoId };
}
