import type { BackendKind } from './backend-target.vo';

export type TransferStatus = 'success' | 'skipped';

/**
 * Result for one remote object / file
 */
export interface ObjectTransferOutcome {
  readonly key: string;
  readonly localPath: string;
  readonly status: TransferStatus;
  readonly bytes: number;
}

/**
 * Result of one backend fetch. A fetch either succeeds as a whole or throws,
 * so failed objects never appear here; they are only logged.
 */
export interface FetchOutcome {
  readonly backend: BackendKind;
  /** `skipped` when every object was already present locally */
  readonly status: 'success' | 'skipped';
  readonly transferred: number;
  readonly skipped: number;
  readonly bytes: number;
  readonly objects: readonly ObjectTransferOutcome[];
}

export function summarizeFetch(
  backend: BackendKind,
  objects: readonly ObjectTransferOutcome[],
): FetchOutcome {
  let transferred = 0;
  let skipped = 0;
  let bytes = 0;

  for (const outcome of objects) {
    if (outcome.status === 'success') {
      transferred++;
      bytes += outcome.bytes;
    } else {
      skipped++;
    }
  }

  return {
    backend,
    status: objects.length > 0 && skipped === objects.length ? 'skipped' : 'success',
    transferred,
    skipped,
    bytes,
    objects,
  };
}
