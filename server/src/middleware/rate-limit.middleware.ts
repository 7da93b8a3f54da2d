/**
 * Rate Limiting Middleware
 *
 * Fixed-window limits per client IP for the endpoints that start paid
 * upstream work (scraper runs on scan-nearby, LLM batches on process-menus).
 * Over the limit the request goes to the error middleware as a 429.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError } from './error.middleware.js';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  /** Separates the counters of different endpoints */
  keyPrefix: string;
}

interface WindowEntry {
  count: number;
  resetTime: number;
}

export class FixedWindowCounter {
  private readonly windows = new Map<string, WindowEntry>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(sweepIntervalMs = 60_000) {
    this.sweeper = setInterval(() => this.sweep(), sweepIntervalMs);
    this.sweeper.unref();
  }

  hit(key: string, windowMs: number, now = Date.now()): WindowEntry {
    const entry = this.windows.get(key);
    if (!entry || entry.resetTime <= now) {
      const fresh = { count: 1, resetTime: now + windowMs };
      this.windows.set(key, fresh);
      return fresh;
    }
    entry.count++;
    return entry;
  }

  get size(): number {
    return this.windows.size;
  }

  destroy(): void {
    clearInterval(this.sweeper);
    this.windows.clear();
  }

  private sweep(now = Date.now()): void {
    for (const [key, entry] of this.windows) {
      if (entry.resetTime <= now) this.windows.delete(key);
    }
  }
}

const sharedCounter = new FixedWindowCounter();

/** First X-Forwarded-For hop, else the socket address */
export function clientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const raw = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const first = raw?.split(',')[0]?.trim();
  return first || req.socket.remoteAddress || 'unknown';
}

export function createRateLimiter(
  config: RateLimitConfig,
  counter: FixedWindowCounter = sharedCounter
): RequestHandler {
  const { windowMs, maxRequests, keyPrefix } = config;

  return (req: Request, res: Response, next: NextFunction): void => {
    const ip = clientIp(req);
    const window = counter.hit(`${keyPrefix}:${ip}`, windowMs);
    const remaining = Math.max(0, maxRequests - window.count);

    res.setHeader('X-RateLimit-Limit', String(maxRequests));
    res.setHeader('X-RateLimit-Remaining', String(remaining));
    res.setHeader('X-RateLimit-Reset', String(Math.floor(window.resetTime / 1000)));

    if (window.count <= maxRequests) {
      next();
      return;
    }

    const retryAfter = Math.max(1, Math.ceil((window.resetTime - Date.now()) / 1000));
    res.setHeader('Retry-After', String(retryAfter));
    req.log.warn({ ip, path: req.path, limit: maxRequests, retryAfter }, '[RateLimit] Request blocked');

    next(new AppError('Too many requests', 429, 'RATE_LIMIT_EXCEEDED', { retryAfter }, true));
  };
}

/** Stops the shared counter's sweeper (shutdown, end of test files) */
export function destroyRateLimiter(): void {
  sharedCounter.destroy();
}
