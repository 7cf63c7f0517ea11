/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { DownloadStartedEvent, type DownloadStartedEventPayload } from './download-started.event';
export {
  DownloadCompletedEvent,
  type DownloadCompletedEventPayload,
} from './download-completed.event';
export { DownloadFailedEvent, type DownloadFailedEventPayload } from './download-failed.event';
