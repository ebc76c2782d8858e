import { LoggerService } from '@/shared/services/logger.service';
import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';

const colorStatus = (status: number): string => {
  if (status >= 200 && status < 300) return `\x1b[32m${status}\x1b[0m`; // Green
  if (status >= 300 && status < 400) return `\x1b[33m${status}\x1b[0m`; // Yellow
  if (status >= 400 && status < 500) return `\x1b[31m${status}\x1b[0m`; // Red
  if (status >= 500) return `\x1b[35m${status}\x1b[0m`; // Magenta
  return status.toString();
};

@Injectable()
export class LoggerMiddleware implements NestMiddleware {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext('HTTP');
  }

  use(req: Request, res: Response, next: NextFunction) {
    const { method, originalUrl, ip } = req;
    const start = process.hrtime();

    res.on('finish', () => {
      const diff = process.hrtime(start);
      const responseTime = (diff[0] * 1e3 + diff[1] * 1e-6).toFixed(3);
      const contentLength = res.get('content-length') ?? 0;

      this.logger.log(
        `${method} ${originalUrl} ${colorStatus(res.statusCode)} - ${responseTime}ms - ${contentLength} - ${ip}`,
      );
    });
    next();
  }
}
