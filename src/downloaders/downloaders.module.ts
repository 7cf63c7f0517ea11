import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { BackendResolverService } from './services/backend-resolver.service';

@Module({
  imports: [InfrastructureModule],
  providers: [BackendResolverService],
  exports: [BackendResolverService],
})
export class DownloadersModule {}
