import { DomainEvent } from './base.event';
import type { BackendKind } from '../value-objects/backend-target.vo';

/**
 * Download Failed Event
 * Emitted when the backend fetch throws; the lease has already been released
 */
export interface DownloadFailedEventPayload {
  jobId: string;
  source: string;
  destination: string;
  backend: BackendKind;
  errorCode: string;
  errorMessage: string;
  durationMs: number;
}

export class DownloadFailedEvent extends DomainEvent {
  constructor(public readonly payload: DownloadFailedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'download.failed';
  }

  get errorCode(): string {
    return this.payload.errorCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
