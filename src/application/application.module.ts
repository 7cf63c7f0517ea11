import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { DownloadersModule } from '../downloaders/downloaders.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { DownloadModelUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * This module depends on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [ConfigModule, InfrastructureModule, DownloadersModule],
  providers: [DownloadModelUseCase],
  exports: [DownloadModelUseCase],
})
export class ApplicationModule {}
