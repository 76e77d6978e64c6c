import type { NextFunction, Request, Response } from 'express';
import { ENV } from './env';

type Bucket = { count: number; resetAt: number };

const buckets = new Map<string, Bucket>();

// 새 창을 열 때 만료된 버킷을 함께 지워 Map 이 클라이언트 수만큼만 유지되게 한다
function sweepExpired(now: number): void {
  for (const [key, bucket] of buckets) {
    if (bucket.resetAt <= now) buckets.delete(key);
  }
}

function currentBucket(key: string, now: number): Bucket {
  const existing = buckets.get(key);
  if (!existing || existing.resetAt <= now) {
    sweepExpired(now);
    const bucket = { count: 0, resetAt: now + ENV.RATE_LIMIT_WINDOW_MS };
    buckets.set(key, bucket);
    return bucket;
  }
  return existing;
}

/** 클라이언트 IP 별 고정 창 카운터 */
export function rateLimiter(req: Request, res: Response, next: NextFunction) {
  const now = Date.now();
  const key = req.ip || 'global';
  const bucket = currentBucket(key, now);
  bucket.count += 1;

  if (bucket.count > ENV.RATE_LIMIT_MAX) {
    const retryAfter = Math.max(0, bucket.resetAt - now);
    res.setHeader('Retry-After', Math.ceil(retryAfter / 1000));
    res.status(429).json({ error: 'rate_limited', message: 'Too many requests. Try again later.' });
    return;
  }

  next();
}

export function trackedClientCount(): number {
  return buckets.size;
}

export function resetRateLimits(): void {
  buckets.clear();
}
