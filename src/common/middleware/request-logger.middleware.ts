import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';

const MAX_LOGGED_RESPONSE_LENGTH = 500;

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('RequestLogger');

  use(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const { method, originalUrl, query, headers } = req;
    const userId = headers['x-user-id'] || query.user_id || 'anonymous';
    const requestId = Math.random().toString(36).substring(7);

    const middlewareLogger = this.logger;

    middlewareLogger.log(
      `[${requestId}] [${method}] ${originalUrl}` +
      `\nUser: ${String(userId)}` +
      `\nUA: ${headers['user-agent'] ?? 'unknown'}` +
      `\nQuery: ${JSON.stringify(query)}`
    );

    // Wrap res.send to log status and duration once the body goes out.
    const originalSend = res.send;
    res.send = function (this: Response, responseBody?: unknown) {
      const duration = Date.now() - startTime;
      const serialized = typeof responseBody === 'string' ? responseBody : JSON.stringify(responseBody);
      middlewareLogger.log(
        `[${requestId}] [${method}] ${originalUrl} - Status: ${res.statusCode} - Duration: ${duration}ms`
      );
      middlewareLogger.debug(
        `[${requestId}] Response: ${(serialized ?? '').slice(0, MAX_LOGGED_RESPONSE_LENGTH)}`
      );
      return originalSend.call(this, responseBody);
    };

    next();
  }
}
