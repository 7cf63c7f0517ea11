import type { DomainEvent } from '../../../domain/events/base.event';

/**
 * Event Publisher Port (Driven Port)
 * Download lifecycle events. Publishing must never fail a download.
 */
export interface EventPublisherPort {
  publish(event: DomainEvent): Promise<void>;

  /**
   * Fire and forget; failures are logged by the implementation
   */
  publishAsync(event: DomainEvent): void;
}
