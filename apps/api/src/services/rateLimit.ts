import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import type { NextFunction, Request, Response } from "express";
import { env } from "./env";

export type RateLimitDecision = { allowed: boolean; remaining: number };

export type RateLimiter = (key: string) => Promise<RateLimitDecision>;

/**
 * Fixed window per key, kept in process memory.
 */
export function memoryRateLimiter(limit: number, windowMs: number, now: () => number = Date.now): RateLimiter {
  const hits = new Map<string, { count: number; resetAt: number }>();

  return async (key) => {
    const t = now();
    const cur = hits.get(key);
    if (!cur || t > cur.resetAt) {
      hits.set(key, { count: 1, resetAt: t + windowMs });
      return { allowed: true, remaining: limit - 1 };
    }

    if (cur.count >= limit) return { allowed: false, remaining: 0 };

    cur.count += 1;
    return { allowed: true, remaining: limit - cur.count };
  };
}

/**
 * Upstash sliding window when configured, otherwise the in-memory window.
 */
export function createRateLimiter(limitPerMinute = env.RATE_LIMIT_PER_MINUTE): RateLimiter {
  if (env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN) {
    const limiter = new Ratelimit({
      redis: new Redis({ url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN }),
      limiter: Ratelimit.slidingWindow(limitPerMinute, "1 m"),
      prefix: "claimwatch:ratelimit"
    });
    return async (key) => {
      const r = await limiter.limit(key);
      return { allowed: r.success, remaining: r.remaining };
    };
  }
  return memoryRateLimiter(limitPerMinute, 60_000);
}

function clientIp(req: Request): string {
  return req.headers["x-forwarded-for"]?.toString().split(",")[0]?.trim() || req.socket.remoteAddress || "unknown";
}

export function rateLimitMiddleware(limiter: RateLimiter) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const r = await limiter(clientIp(req));
      res.setHeader("X-RateLimit-Remaining", String(r.remaining));
      if (!r.allowed) {
        res.status(429).json({ error: "Rate limit exceeded", code: "rate_limited" });
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
