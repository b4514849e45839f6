import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { cacheGet, cacheGetJson, cacheSet, cacheSetJson, clearMemoryCache } from "../cache";

const Schema = z.object({ title: z.string() });

describe("memory cache", () => {
  beforeEach(() => {
    clearMemoryCache();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("round-trips JSON values through the schema", async () => {
    await cacheSetJson("doc", { title: "Pricing" }, 60);
    expect(await cacheGetJson("doc", Schema)).toEqual({ title: "Pricing" });
    expect(await cacheGetJson("other", Schema)).toBeNull();
  });

  it("treats entries that no longer match as misses", async () => {
    await cacheSetJson("doc", { heading: "Pricing" }, 60);
    expect(await cacheGetJson("doc", Schema)).toBeNull();

    await cacheSet("broken", "{not json", 60);
    expect(await cacheGetJson("broken", Schema)).toBeNull();
  });

  it("expires entries after their ttl", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T00:00:00Z"));
    await cacheSet("page", "<html></html>", 10);
    expect(await cacheGet("page")).toBe("<html></html>");

    vi.setSystemTime(new Date("2024-03-01T00:00:11Z"));
    expect(await cacheGet("page")).toBeNull();
  });
});
