import { describe, expect, it, vi } from "vitest";
import { answer, FakeProvider, silentLogger, type Reply } from "../../__tests__/fakes";
import { AIRouter } from "../../llm/router";
import { ProviderRequestError, ProviderUnavailableError, TransientProviderError } from "../../services/errors";
import { ExtractionAgent, quoteSupported } from "../extractor";
import { FEATURE_SCHEMA, PRICING_SCHEMA } from "../schemas";

const EVIDENCE =
  "Acme Plus costs $49 per user per month. A free plan is available. Enterprise pricing: contact sales.";

const FULL_ANSWER = answer(
  {
    pricing_model: { value: "per_user", quote: "$49 per user per month" },
    base_price: { value: 49, quote: "costs $49 per user per month" },
    price_unit: { value: "per user per month", quote: "per user per month" },
    currency: { value: "USD", quote: "$49" },
    free_tier: { value: true, quote: "A free plan is available." },
    enterprise_pricing: { value: "contact sales", quote: "Enterprise pricing: contact sales" }
  },
  "Listed on the pricing page."
);

function agentWith(script: Reply[], opts: { maxChars?: number } = {}) {
  const provider = new FakeProvider("ollama", "llama3.1", script);
  const router = new AIRouter({ providers: [provider], failureThreshold: 5, logger: silentLogger });
  const sleep = vi.fn(async (_ms: number) => undefined);
  const agent = new ExtractionAgent({ router, sleep, logger: silentLogger, maxChars: opts.maxChars });
  return { agent, provider, sleep };
}

const ctx = { competitorName: "Acme", sourceType: "website" };

describe("ExtractionAgent", () => {
  it("extracts quoted fields into a candidate", async () => {
    const { agent, provider } = agentWith([FULL_ANSWER]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);

    expect(c.status).toBe("extracted");
    expect(c.fields).toEqual({
      pricing_model: "per_user",
      base_price: 49,
      price_unit: "per user per month",
      currency: "USD",
      free_tier: true,
      enterprise_pricing: "contact sales"
    });
    expect(c.evidenceQuote).toBe("$49 per user per month");
    expect(c.reasoning).toBe("Listed on the pricing page.");
    expect(c.rawConfidence).toBe(1);
    expect(c.attempts).toBe(1);
    expect(c.model).toBe("llama3.1");
    expect(provider.calls[0].json).toBe(true);
  });

  it("drops values whose quote is not in the evidence", async () => {
    const { agent } = agentWith([
      answer({
        pricing_model: { value: "per_user", quote: "per user per month" },
        base_price: { value: 59, quote: "$59 per seat" }
      })
    ]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.fields.base_price).toBeNull();
    expect(c.evidenceQuotes.base_price).toBeNull();
    expect(c.fields.pricing_model).toBe("per_user");
    expect(c.rawConfidence).toBe(0.85);
  });

  it("drops values of the wrong type", async () => {
    const { agent } = agentWith([answer({ base_price: { value: "49", quote: "$49" } })]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.fields.base_price).toBeNull();
  });

  it("repairs a reply wrapped in prose", async () => {
    const { agent } = agentWith([`Here is the JSON:\n\`\`\`json\n${FULL_ANSWER}\n\`\`\``]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.status).toBe("extracted");
    expect(c.fields.base_price).toBe(49);
  });

  it("retries unparseable replies with exponential backoff", async () => {
    const { agent, sleep } = agentWith(["not json", FULL_ANSWER]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.status).toBe("extracted");
    expect(c.attempts).toBe(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it("returns a review candidate with the raw reply when parsing never succeeds", async () => {
    const { agent, provider, sleep } = agentWith(["not json at all"]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, { ...ctx, claimSubtype: "enterprise" });

    expect(c.status).toBe("review_required");
    expect(c.rawText).toBe("not json at all");
    expect(c.parseError).toBe("Reply is not JSON: Model did not return JSON.");
    expect(c.claimSubtype).toBe("enterprise");
    expect(c.rawConfidence).toBe(0);
    expect(Object.values(c.fields).every((v) => v === null)).toBe(true);
    expect(provider.calls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("treats JSON of the wrong shape as unparseable", async () => {
    const { agent } = agentWith(['{"answer": 1}']);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.status).toBe("review_required");
    expect(c.parseError).toMatch(/^Reply does not match the answer shape/);
  });

  it("gives up on persistent transient failures", async () => {
    const { agent, provider } = agentWith([new ProviderRequestError("ollama", 503, "busy")]);
    await expect(agent.extract(EVIDENCE, PRICING_SCHEMA, ctx)).rejects.toBeInstanceOf(TransientProviderError);
    expect(provider.calls).toHaveLength(3);
  });

  it("recovers from a transient failure", async () => {
    const { agent } = agentWith([new ProviderRequestError("ollama", 429, "slow down"), FULL_ANSWER]);
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.attempts).toBe(2);
  });

  it("fails fast when no provider is available", async () => {
    const router = new AIRouter({ providers: [], logger: silentLogger });
    const agent = new ExtractionAgent({ router, logger: silentLogger, sleep: async () => undefined });
    await expect(agent.extract(EVIDENCE, PRICING_SCHEMA, ctx)).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it("fails fast when the provider rejects the request", async () => {
    const { agent, provider } = agentWith([new ProviderRequestError("ollama", 401, "unauthorized")]);
    await expect(agent.extract(EVIDENCE, PRICING_SCHEMA, ctx)).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(provider.calls).toHaveLength(1);
  });

  it("truncates long evidence before prompting", async () => {
    const { agent, provider } = agentWith([FULL_ANSWER], { maxChars: 20 });
    const c = await agent.extract(EVIDENCE, PRICING_SCHEMA, ctx);
    expect(c.truncated).toBe(true);
    expect(provider.calls[0].prompt.endsWith(EVIDENCE.slice(0, 20))).toBe(true);
    // Quotes beyond the cut no longer count as support.
    expect(c.fields.enterprise_pricing).toBeNull();
  });

  it("uses the schema's confidence bonus", async () => {
    const { agent } = agentWith([
      answer({
        feature_name: { value: "Acme Plus", quote: "Acme Plus" },
        feature_category: { value: "other", quote: "Acme Plus" }
      })
    ]);
    const c = await agent.extract(EVIDENCE, FEATURE_SCHEMA, ctx);
    expect(c.fields.feature_name).toBe("Acme Plus");
    expect(c.rawConfidence).toBe(0.8);
  });
});

describe("quoteSupported", () => {
  it("matches case-insensitively across whitespace", () => {
    expect(quoteSupported("ACME  plus\ncosts", EVIDENCE)).toBe(true);
    expect(quoteSupported("", EVIDENCE)).toBe(false);
    expect(quoteSupported(null, EVIDENCE)).toBe(false);
    expect(quoteSupported("Acme Pro", EVIDENCE)).toBe(false);
  });
});
