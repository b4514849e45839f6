import { describe, expect, it } from "vitest";
import { parseEnv } from "../env";

describe("parseEnv", () => {
  it("applies defaults", () => {
    const env = parseEnv({});
    expect(env.PORT).toBe("8787");
    expect(env.AI_PROVIDER).toBe("hybrid");
    expect(env.LOG_LEVEL).toBe("info");
    expect(env.AI_ROUTING).toEqual({});
    expect(env.AI_FALLBACK_ENABLED).toBe(true);
    expect(env.OLLAMA_ENABLED).toBe(false);
    expect(env.CLAIM_MIN_SCORE).toBe(40);
    expect(env.REFRESH_CONCURRENCY).toBe(3);
    expect(env.REFRESH_JOB_TIMEOUT_MS).toBe(120000);
    expect(env.REFRESH_ON_START).toBe("interrupted");
    expect(env.RATE_LIMIT_PER_MINUTE).toBe(30);
  });

  it("coerces values and treats blanks as unset", () => {
    const env = parseEnv({
      AI_ROUTING: '{"data_extraction":"openai"}',
      OLLAMA_ENABLED: "1",
      REFRESH_CONCURRENCY: "5",
      CORS_ORIGIN: ""
    });
    expect(env.AI_ROUTING).toEqual({ data_extraction: "openai" });
    expect(env.OLLAMA_ENABLED).toBe(true);
    expect(env.REFRESH_CONCURRENCY).toBe(5);
    expect(env.CORS_ORIGIN).toBe("http://localhost:5173");
  });

  it("rejects invalid settings", () => {
    expect(() => parseEnv({ AI_ROUTING: "data_extraction=openai" })).toThrow(/AI_ROUTING must be a JSON object/);
    expect(() => parseEnv({ REFRESH_CONCURRENCY: "0" })).toThrow();
    expect(() => parseEnv({ REFRESH_ON_START: "sometimes" })).toThrow();
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
