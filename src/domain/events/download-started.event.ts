import { DomainEvent } from './base.event';
import type { BackendKind } from '../value-objects/backend-target.vo';

/**
 * Download Started Event
 * Emitted once the lease is held and the backend fetch begins
 */
export interface DownloadStartedEventPayload {
  jobId: string;
  source: string;
  destination: string;
  backend: BackendKind;
  lockAttempts: number;
}

export class DownloadStartedEvent extends DomainEvent {
  constructor(public readonly payload: DownloadStartedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'download.started';
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
