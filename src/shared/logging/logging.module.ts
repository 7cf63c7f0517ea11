import { Global, Module, Scope } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';

/**
 * Transient scope: every consumer gets its own instance, so one service's
 * setContext() never relabels another's lines.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [{ provide: PinoLoggerService, useClass: PinoLoggerService, scope: Scope.TRANSIENT }],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
