import { Redis } from "@upstash/redis";
import type { z } from "zod";
import { env } from "./env";
import { logWarning } from "./logger";

/**
 * Fetched pages and readable text are cached in Upstash Redis when configured,
 * otherwise in process memory. Values are stored as strings.
 */
const redis =
  env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN
    ? new Redis({ url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN })
    : null;

type CacheValue = { value: string; expiresAt: number };
const mem = new Map<string, CacheValue>();

export async function cacheGet(key: string): Promise<string | null> {
  if (redis) {
    const v = await redis.get<string>(key);
    return v ?? null;
  }

  const hit = mem.get(key);
  if (!hit) return null;

  if (Date.now() > hit.expiresAt) {
    mem.delete(key);
    return null;
  }

  return hit.value;
}

export async function cacheSet(key: string, value: string, ttlSeconds: number): Promise<void> {
  if (redis) {
    await redis.set(key, value, { ex: ttlSeconds });
    return;
  }

  mem.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
}

/**
 * Read a cached JSON value. Entries that no longer match the schema are
 * treated as misses.
 */
export async function cacheGetJson<T extends z.ZodTypeAny>(key: string, schema: T): Promise<z.infer<T> | null> {
  const raw = await cacheGet(key);
  if (raw === null) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch (err) {
    logWarning("Discarding unreadable cache entry", { key, error: err instanceof Error ? err.message : String(err) });
    return null;
  }
  logWarning("Discarding stale cache entry", { key });
  return null;
}

export async function cacheSetJson(key: string, value: unknown, ttlSeconds: number): Promise<void> {
  await cacheSet(key, JSON.stringify(value), ttlSeconds);
}

export function clearMemoryCache(): void {
  mem.clear();
}
