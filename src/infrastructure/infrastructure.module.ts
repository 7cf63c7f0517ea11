import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';

// Shared services (existing infrastructure)
import { S3Module } from '../shared/aws/s3/s3.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Injection tokens (string symbols for DI)
import {
  EVENT_PUBLISHER_PORT,
  LEASE_LOCK_FACTORY_PORT,
  MODEL_HUB_PORT,
  OBJECT_STORAGE_PORT,
  VOLUME_SYNC_PORT,
} from '../application/ports/tokens';

// Adapters (implementations)
import { FileLeaseLockFactory } from './adapters/locking/file-lease-lock.adapter';
import { S3ObjectStorageAdapter } from './adapters/storage/s3-object-storage.adapter';
import { HuggingFaceHubAdapter } from './adapters/hub/huggingface-hub.adapter';
import { RsyncVolumeSyncAdapter } from './adapters/volume/rsync-volume-sync.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (AWS services, logging)
 * 2. Creates adapters that implement ports
 * 3. Exports adapters so they can be injected into use cases
 */
@Module({
  imports: [ConfigModule, LoggingModule, S3Module],
  providers: [
    // Locking
    {
      provide: LEASE_LOCK_FACTORY_PORT,
      useClass: FileLeaseLockFactory,
    },

    // Storage adapters
    {
      provide: OBJECT_STORAGE_PORT,
      useClass: S3ObjectStorageAdapter,
    },
    {
      provide: MODEL_HUB_PORT,
      useClass: HuggingFaceHubAdapter,
    },
    {
      provide: VOLUME_SYNC_PORT,
      useClass: RsyncVolumeSyncAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [
    // Export port tokens so they can be injected
    LEASE_LOCK_FACTORY_PORT,
    OBJECT_STORAGE_PORT,
    MODEL_HUB_PORT,
    VOLUME_SYNC_PORT,
    EVENT_PUBLISHER_PORT,
  ],
})
export class InfrastructureModule {}
