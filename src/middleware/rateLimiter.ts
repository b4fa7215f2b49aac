// src/middleware/rateLimiter.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import { sendError } from "./responseHelper";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory fixed-window rate limiter.
 * One instance per app; state is lost on restart.
 */
export class RateLimiter {
  private store = new Map<string, RateLimitEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(cleanupEveryMs = 60000) {
    this.cleanupInterval = setInterval(() => this.cleanup(), cleanupEveryMs);
    // never keep the process alive just for housekeeping
    this.cleanupInterval.unref();
  }

  private cleanup() {
    const now = Date.now();
    for (const [key, entry] of this.store.entries()) {
      if (entry.resetAt < now) {
        this.store.delete(key);
      }
    }
  }

  check(key: string, windowMs: number, maxRequests: number): { allowed: boolean; remaining: number; resetAt: number } {
    const now = Date.now();
    const entry = this.store.get(key);

    if (!entry || entry.resetAt < now) {
      const resetAt = now + windowMs;
      this.store.set(key, { count: 1, resetAt });
      return { allowed: true, remaining: maxRequests - 1, resetAt };
    }

    if (entry.count >= maxRequests) {
      return { allowed: false, remaining: 0, resetAt: entry.resetAt };
    }

    entry.count++;
    return { allowed: true, remaining: maxRequests - entry.count, resetAt: entry.resetAt };
  }

  destroy() {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }
}

export interface RateLimitOptions {
  windowMs?: number;      // default: 60000 = 1 minute
  maxRequests?: number;   // default: 30
  limiter?: RateLimiter;
}

/**
 * Rate limiting middleware.
 * Limits requests per IP address by default.
 */
function clientKey(req: Request): string {
  // Use X-Forwarded-For for proxied requests, fallback to IP
  const forwarded = req.headers["x-forwarded-for"];
  const ip = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(",")[0]?.trim();
  return ip || req.ip || req.socket.remoteAddress || "unknown";
}

export function rateLimitMiddleware(options: RateLimitOptions = {}): RequestHandler {
  const { windowMs = 60000, maxRequests = 30, limiter = new RateLimiter() } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    const key = clientKey(req);
    const result = limiter.check(key, windowMs, maxRequests);

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(result.resetAt / 1000));

    if (!result.allowed) {
      const retryAfter = Math.ceil((result.resetAt - Date.now()) / 1000);
      res.setHeader("Retry-After", retryAfter);
      sendError(res, "Too many plan requests, please try again later", 429, { code: "RATE_LIMITED", retryAfter });
      return;
    }

    next();
  };
}
