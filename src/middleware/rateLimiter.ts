// src/middleware/rateLimiter.ts
// Fixed-window request limits per client address.

import { Request, Response, NextFunction, RequestHandler } from "express";
import { sendError } from "./responseHelper";

interface Window {
  count: number;
  resetAt: number;
}

export interface HitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

/**
 * Counts hits per key in fixed windows. Expired windows are swept at most
 * once per window length, so there is no timer to keep the process alive.
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, Window>();
  private lastSweep = 0;

  constructor(
    private readonly windowMs: number,
    private readonly limit: number,
    private readonly now: () => number = Date.now
  ) {}

  hit(key: string): HitResult {
    const now = this.now();
    this.sweep(now);

    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + this.windowMs };
      this.windows.set(key, window);
    }

    if (window.count >= this.limit) {
      return { allowed: false, remaining: 0, retryAfterMs: window.resetAt - now };
    }
    window.count += 1;
    return { allowed: true, remaining: this.limit - window.count, retryAfterMs: window.resetAt - now };
  }

  get size(): number {
    return this.windows.size;
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < this.windowMs) return;
    this.lastSweep = now;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message: string;
  skip?: (req: Request) => boolean;
  now?: () => number;
}

/**
 * Keys on `req.ip`, which follows the app's "trust proxy" setting.
 * Forwarding headers are never read directly.
 */
export function rateLimit(options: RateLimitOptions): RequestHandler {
  const counter = new FixedWindowCounter(options.windowMs, options.maxRequests, options.now);

  return (req: Request, res: Response, next: NextFunction) => {
    if (options.skip?.(req)) {
      return next();
    }

    const key = req.ip ?? req.socket.remoteAddress ?? "unknown";
    const result = counter.hit(key);
    res.setHeader("X-RateLimit-Limit", options.maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);

    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil(result.retryAfterMs / 1000));
      res.setHeader("Retry-After", retryAfter);
      sendError(res, options.message, 429, { code: "RATE_LIMITED", retryAfter });
      return;
    }
    next();
  };
}
