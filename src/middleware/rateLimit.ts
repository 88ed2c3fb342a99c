import type { NextFunction, Request, Response } from 'express';
import type { VerifyResponse } from '../types.js';

type Bucket = { count: number; resetAt: number };

type RateLimitOpts = {
  windowMs: number;
  max: number;
  errorMessage?: string;
};

export type HitResult = { allowed: true } | { allowed: false; retryAfterSec: number };

/**
 * Fixed-window counter per key. Expired buckets are swept at most once per
 * window, so the map only holds keys seen in the current window or the last.
 */
export class FixedWindowLimiter {
  private buckets = new Map<string, Bucket>();
  private nextSweepAt = 0;

  constructor(private windowMs: number, private max: number) {}

  get size(): number {
    return this.buckets.size;
  }

  hit(key: string, at: number): HitResult {
    this.sweep(at);
    let bucket = this.buckets.get(key);
    if (!bucket || bucket.resetAt <= at) {
      bucket = { count: 0, resetAt: at + this.windowMs };
      this.buckets.set(key, bucket);
    }
    if (bucket.count >= this.max) {
      return { allowed: false, retryAfterSec: Math.max(1, Math.ceil((bucket.resetAt - at) / 1000)) };
    }
    bucket.count += 1;
    return { allowed: true };
  }

  private sweep(at: number) {
    if (at < this.nextSweepAt) return;
    for (const [key, bucket] of this.buckets) {
      if (bucket.resetAt <= at) this.buckets.delete(key);
    }
    this.nextSweepAt = at + this.windowMs;
  }
}

// Fixed window per client IP; each call creates an isolated limiter
export function rateLimit(opts: RateLimitOpts) {
  const limiter = new FixedWindowLimiter(opts.windowMs, opts.max);
  const errorMessage = opts.errorMessage ?? 'Too many requests';
  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.hit(req.ip || 'unknown', Date.now());
    if (!result.allowed) {
      res.setHeader('Retry-After', String(result.retryAfterSec));
      const body: VerifyResponse = { status: 'FAILED', message: errorMessage };
      return res.status(429).json(body);
    }
    next();
  };
}
