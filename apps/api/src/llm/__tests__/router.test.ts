import { describe, expect, it } from "vitest";
import { FakeProvider, silentLogger } from "../../__tests__/fakes";
import { ProviderRequestError } from "../../services/errors";
import { AIRouter } from "../router";

const ok = '{"ok":true}';
const outage = () => new ProviderRequestError("fake", 503, "upstream down");

function routerWith(providers: FakeProvider[], overrides: Partial<ConstructorParameters<typeof AIRouter>[0]> = {}) {
  return new AIRouter({ providers, logger: silentLogger, ...overrides });
}

describe("AIRouter", () => {
  it("returns an explicit unavailable response when nothing is registered", async () => {
    const res = await routerWith([]).route("data_extraction", "hi");
    expect(res.success).toBe(false);
    expect(res.errorKind).toBe("unavailable");
    expect(res.provider).toBe("none");
    expect(res.error).toBe("No AI provider available for this task.");
  });

  it("sends auto tasks to the cheapest backend", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [ok]);
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const res = await routerWith([openai, ollama]).route("data_extraction", "extract");
    expect(res.provider).toBe("ollama");
    expect(openai.calls).toHaveLength(0);
  });

  it("honours the routing table for named tasks", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [ok]);
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const res = await routerWith([openai, ollama]).route("change_analysis", "diff");
    expect(res.provider).toBe("openai");
  });

  it("applies routing overrides", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [ok]);
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const router = routerWith([openai, ollama], { routing: { data_extraction: "openai" } });
    expect(router.routingTable().data_extraction).toBe("openai");
    expect((await router.route("data_extraction", "x")).provider).toBe("openai");
  });

  it("falls back to the next backend on failure", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [outage()]);
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const res = await routerWith([openai, ollama]).route("change_analysis", "diff");
    expect(res.success).toBe(true);
    expect(res.provider).toBe("ollama");
    expect(openai.calls).toHaveLength(1);
  });

  it("does not fall back when fallback is disabled", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [outage()]);
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const res = await routerWith([openai, ollama], { fallbackEnabled: false }).route("change_analysis", "diff");
    expect(res.success).toBe(false);
    expect(res.errorKind).toBe("transient");
    expect(ollama.calls).toHaveLength(0);
  });

  it("reports unavailable when the pinned backend is not registered and fallback is off", async () => {
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    const router = routerWith([ollama], { fallbackEnabled: false });
    expect(router.selectProvider("change_analysis")).toBeNull();
    expect((await router.route("change_analysis", "diff")).errorKind).toBe("unavailable");
  });

  it("opens the circuit after consecutive failures until the next run", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [outage()]);
    const router = routerWith([openai], { failureThreshold: 2 });

    expect((await router.route("data_extraction", "a")).errorKind).toBe("transient");
    expect((await router.route("data_extraction", "b")).errorKind).toBe("transient");
    expect(router.isAvailable("openai")).toBe(false);
    expect((await router.route("data_extraction", "c")).errorKind).toBe("unavailable");
    expect(openai.calls).toHaveLength(2);

    router.beginRun();
    expect(router.isAvailable("openai")).toBe(true);
  });

  it("resets the failure count after a success", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [outage(), ok, outage(), outage()]);
    const router = routerWith([openai], { failureThreshold: 2 });
    await router.route("data_extraction", "a");
    await router.route("data_extraction", "b");
    await router.route("data_extraction", "c");
    expect(router.isAvailable("openai")).toBe(true);
  });

  it("marks rejected requests as fatal", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [new ProviderRequestError("openai", 401, "bad key")]);
    const res = await routerWith([openai]).route("data_extraction", "x");
    expect(res.errorKind).toBe("fatal");
    expect(res.error).toBe("openai request failed (401): bad key");
  });

  it("treats an empty completion as a transient failure", async () => {
    const ollama = new FakeProvider("ollama", "llama3.1", ["   "]);
    const res = await routerWith([ollama]).route("data_extraction", "x");
    expect(res.success).toBe(false);
    expect(res.errorKind).toBe("transient");
  });

  it("uses JSON mode when asked", async () => {
    const ollama = new FakeProvider("ollama", "llama3.1", [ok]);
    await routerWith([ollama]).route("data_extraction", "x", { requireJson: true, systemPrompt: "{}" });
    expect(ollama.calls[0].json).toBe(true);
    expect(ollama.calls[0].opts?.systemPrompt).toBe("{}");
  });

  it("tracks usage and cost per backend", async () => {
    const openai = new FakeProvider("openai", "gpt-4o-mini", [ok]);
    const router = routerWith([openai]);
    const res = await router.route("data_extraction", "x");
    expect(res.costEstimate).toBeCloseTo(0.000045, 9);

    const usage = router.getUsage().openai;
    expect(usage.requests).toBe(1);
    expect(usage.failures).toBe(0);
    expect(usage.inputTokens).toBe(100);
    expect(usage.outputTokens).toBe(50);
  });
});
