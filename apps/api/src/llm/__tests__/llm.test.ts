import { describe, expect, it } from "vitest";
import { parseEnv } from "../../services/env";
import { createProviders, createRouter, resolveRouting } from "..";
import { braceRange, parseJsonLenient } from "../jsonSchema";
import { costRank, estimateCost } from "../pricing";

describe("parseJsonLenient", () => {
  it("parses clean JSON without repair", () => {
    expect(parseJsonLenient('{"a":1}')).toEqual({ ok: true, value: { a: 1 }, repaired: false });
  });

  it("repairs fenced or chatty replies from the brace range", () => {
    const r = parseJsonLenient('Sure!\n```json\n{"a":[1,2]}\n```');
    expect(r).toEqual({ ok: true, value: { a: [1, 2] }, repaired: true });
  });

  it("fails on replies with no JSON", () => {
    expect(parseJsonLenient("no idea")).toEqual({ ok: false, error: "Model did not return JSON." });
    expect(parseJsonLenient("{ broken")).toEqual({ ok: false, error: "Model did not return JSON." });
    expect(parseJsonLenient("x {a: 1} y")).toEqual({ ok: false, error: "Model returned malformed JSON." });
  });

  it("slices from the first opening to the last closing bracket", () => {
    expect(braceRange('pre [1] {"b":2} post')).toBe('[1] {"b":2}');
  });
});

describe("pricing", () => {
  it("estimates cost from the model table", () => {
    expect(estimateCost("gpt-4o", 1_000_000, 1_000_000)).toBeCloseTo(12.5);
    expect(estimateCost("llama3.1", 5000, 5000)).toBe(0);
  });

  it("prices unknown models at the default rate", () => {
    expect(costRank("some-new-model")).toBeCloseTo(0.5);
  });
});

describe("provider wiring", () => {
  it("registers only configured backends", () => {
    expect(createProviders(parseEnv({})).map((p) => p.name)).toEqual([]);
    const env = parseEnv({ OPENAI_API_KEY: "test-secret", OLLAMA_ENABLED: "true" });
    expect(createProviders(env).map((p) => p.name)).toEqual(["openai", "ollama"]);
  });

  it("pins every task to a single provider outside hybrid mode", () => {
    const routing = resolveRouting(parseEnv({ AI_PROVIDER: "openrouter" }));
    expect(new Set(Object.values(routing))).toEqual(new Set(["openrouter"]));
  });

  it("applies AI_ROUTING over the hybrid defaults", () => {
    const routing = resolveRouting(parseEnv({ AI_ROUTING: '{"classification":"openai"}' }));
    expect(routing.classification).toBe("openai");
    expect(routing.data_extraction).toBe("auto");
  });

  it("builds a router with fallback from configuration", () => {
    const env = parseEnv({ OPENROUTER_API_KEY: "test-secret", AI_FALLBACK_ENABLED: "false" });
    const router = createRouter(env);
    expect(router.providerNames()).toEqual(["openrouter"]);
    expect(router.selectProvider("change_analysis")).toBeNull();
    expect(router.selectProvider("data_extraction")?.name).toBe("openrouter");
  });
});
