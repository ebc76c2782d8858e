import { ConsoleLogger, Injectable, Scope } from '@nestjs/common';
import * as winston from 'winston';
import { AppConfigService } from './config.service';

const toTrace = (trace: unknown): string | undefined => {
  if (trace === undefined || trace === null) return undefined;
  if (trace instanceof Error) return trace.stack ?? `${trace.name}: ${trace.message}`;
  return typeof trace === 'string' ? trace : JSON.stringify(trace);
};

/**
 * Transient so every consumer gets its own context; the winston logger and
 * its file transports are shared across instances.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService extends ConsoleLogger {
  private static shared?: winston.Logger;
  private readonly logger: winston.Logger;

  constructor(private readonly configService: AppConfigService) {
    super(LoggerService.name, { timestamp: true });
    if (!LoggerService.shared) {
      LoggerService.shared = winston.createLogger(configService.winstonConfig);
      if (this.configService.nodeEnv !== 'production') {
        LoggerService.shared.debug('Logging initialized at debug level');
      }
    }
    this.logger = LoggerService.shared;
  }

  error(message: string, trace?: unknown, context?: string): void {
    this.logger.error(message, { trace: toTrace(trace), context: context ?? this.context });
  }
  log(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  info(message: string, context?: string) {
    this.logger.info(message, { context: context ?? this.context });
  }
  debug(message: string, context?: string) {
    this.logger.debug(message, { context: context ?? this.context });
  }
  warn(message: string, context?: string) {
    this.logger.warn(message, { context: context ?? this.context });
  }
}
