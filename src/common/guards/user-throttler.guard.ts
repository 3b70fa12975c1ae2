import { ThrottlerGuard } from '@nestjs/throttler';
import { Injectable } from '@nestjs/common';
import { Request } from 'express';

/** Rate-limits per `x-user-id` header when present, otherwise per client IP. */
@Injectable()
export class UserThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Request): Promise<string> {
    const userId = req.headers['x-user-id'];
    if (typeof userId === 'string' && userId.length > 0) {
      return `user:${userId}`;
    }
    return req.ip ?? req.socket.remoteAddress ?? 'unknown';
  }
}
