import { Global, Module } from '@nestjs/common';
import { AppConfigService } from './shared/services/config.service';
import { LoggerService } from './shared/services/logger.service';

/** Configuration and logging, available to every module without importing. */
@Global()
@Module({
  providers: [AppConfigService, LoggerService],
  exports: [AppConfigService, LoggerService],
})
export class SharedModule {}
