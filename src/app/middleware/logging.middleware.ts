import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ADMIN_SESSION_COOKIE } from '../constants';

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction) {
    const { method, originalUrl } = req;
    const startTime = Date.now();

    // Tag only; the guard decides whether the cookie is actually valid
    const sessionCookie: unknown = req.cookies?.[ADMIN_SESSION_COOKIE];
    const userInfo =
      typeof sessionCookie === 'string' && sessionCookie
        ? '[admin]'
        : '[anon]';

    this.logger.log(`${userInfo} → ${method} ${originalUrl}`);

    res.on('finish', () => {
      const { statusCode } = res;
      const duration = Date.now() - startTime;
      const errorMsg: unknown = res.locals?.errorMessage;
      const baseLog = `${userInfo} ← ${method} ${originalUrl} ${statusCode} - ${duration}ms`;
      const logMessage =
        typeof errorMsg === 'string' ? `${baseLog} - ${errorMsg}` : baseLog;

      if (statusCode >= 500) {
        this.logger.error(logMessage);
      } else if (statusCode >= 400) {
        this.logger.warn(logMessage);
      } else {
        this.logger.log(logMessage);
      }
    });

    next();
  }
}
