import type { NextFunction, Request, Response } from "express";

export class RateLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly windowMs: number;
  private readonly maxRequests: number;

  constructor(windowMs: number, maxRequests: number) {
    this.windowMs = windowMs;
    this.maxRequests = maxRequests;
  }

  allow(key: string, now: number = Date.now()): boolean {
    this.sweep(now);
    const timestamps = this.hits.get(key) ?? [];
    if (timestamps.length >= this.maxRequests) return false;
    timestamps.push(now);
    this.hits.set(key, timestamps);
    return true;
  }

  get trackedKeys(): number {
    return this.hits.size;
  }

  private sweep(now: number): void {
    const cutoff = now - this.windowMs;
    for (const [key, timestamps] of this.hits) {
      const live = timestamps.filter(t => t > cutoff);
      if (live.length === 0) this.hits.delete(key);
      else this.hits.set(key, live);
    }
  }
}

export function rateLimit(limiter: RateLimiter, keyOf: (res: Response) => string) {
  return (_req: Request, res: Response, next: NextFunction) => {
    if (!limiter.allow(keyOf(res))) {
      return res.status(429).json({ error: "Too many requests. Try again later." });
    }
    next();
  };
}
