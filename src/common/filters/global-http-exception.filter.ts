import { LoggerService } from '@/shared/services/logger.service';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { Response } from 'express';

/**
 * HttpExceptions keep their status and body. Anything else is logged and
 * answered with a bare 400 so the frontend falls back to its error page.
 */
@Catch()
export class GlobalHttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext(GlobalHttpExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      res.status(exception.getStatus()).json(exception.getResponse());
      return;
    }

    const message = exception instanceof Error ? exception.message : String(exception);
    this.logger.error(`Unhandled exception: ${message}`, exception);
    res.status(HttpStatus.BAD_REQUEST).json({});
  }
}
