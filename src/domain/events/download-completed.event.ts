import { DomainEvent } from './base.event';
import type { BackendKind } from '../value-objects/backend-target.vo';

export interface DownloadCompletedEventPayload {
  jobId: string;
  source: string;
  destination: string;
  backend: BackendKind;
  status: 'success' | 'skipped';
  transferred: number;
  skipped: number;
  bytes: number;
  durationMs: number;
}

export class DownloadCompletedEvent extends DomainEvent {
  constructor(public readonly payload: DownloadCompletedEventPayload) {
    super(payload.jobId);
  }

  get eventName(): string {
    return 'download.completed';
  }

  get status(): 'success' | 'skipped' {
    return this.payload.status;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
