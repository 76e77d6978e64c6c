import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const rid = req.get('X-Request-ID') || randomUUID();
  res.setHeader('X-Request-ID', rid);
  req.requestId = rid;
  next();
}

export function requestIdOf(req: Request): string | undefined {
  return req.requestId ?? req.get('X-Request-ID');
}
