import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Command-line model downloader; the entry point drives the
 * DownloadModelUseCase once per source.
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule],
})
export class AppModule {}
