import { ProviderRequestError } from "../services/errors";
import { logger as defaultLogger, errorMessage, type Logger } from "../services/logger";
import { costRank } from "./pricing";
import type { AIErrorKind, AIProvider, AIResponse, GenerateOptions } from "./provider";

export const AUTO = "auto";

export const DEFAULT_ROUTING: Record<string, string> = {
  bulk_extraction: "ollama",
  data_extraction: AUTO,
  news_analysis: "ollama",
  classification: "ollama",
  change_analysis: "openai",
  executive_summary: AUTO,
  complex_reasoning: "openai"
};

export type RouterConfig = {
  providers: AIProvider[];
  routing?: Record<string, string>;
  fallbackEnabled?: boolean;
  /** Consecutive failures before a provider is skipped for the rest of the run. */
  failureThreshold?: number;
  logger?: Logger;
};

export type RouteOptions = GenerateOptions & {
  requireJson?: boolean;
};

export type ProviderUsage = {
  requests: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  costEstimate: number;
};

/**
 * Routes generation requests by task type across interchangeable backends.
 *
 * - routing table: task_type -> provider name or "auto"
 * - "auto": cheapest available provider by model price
 * - fallback (optional): remaining available providers in cost order
 * - circuit breaker: a provider failing N times in a row is skipped until beginRun()
 */
export class AIRouter {
  private readonly providers: AIProvider[];
  private readonly routing: Record<string, string>;
  private readonly fallbackEnabled: boolean;
  private readonly failureThreshold: number;
  private readonly log: Logger;

  private consecutiveFailures = new Map<string, number>();
  private usage = new Map<string, ProviderUsage>();

  constructor(config: RouterConfig) {
    this.providers = config.providers;
    this.routing = { ...DEFAULT_ROUTING, ...(config.routing ?? {}) };
    this.fallbackEnabled = config.fallbackEnabled ?? true;
    this.failureThreshold = Math.max(1, config.failureThreshold ?? 3);
    this.log = config.logger ?? defaultLogger;
  }

  /** Reset circuit breakers and usage totals for a new refresh run. */
  beginRun(): void {
    this.consecutiveFailures.clear();
    this.usage.clear();
  }

  providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  routingTable(): Record<string, string> {
    return { ...this.routing };
  }

  isAvailable(name: string): boolean {
    if (!this.providers.some((p) => p.name === name)) return false;
    return (this.consecutiveFailures.get(name) ?? 0) < this.failureThreshold;
  }

  /**
   * Ordered list of providers to try for a task. Empty means no provider is
   * available under the current configuration.
   */
  candidatesFor(taskType: string): AIProvider[] {
    const available = this.providers
      .filter((p) => this.isAvailable(p.name))
      .map((p, i) => ({ p, i }))
      .sort((a, b) => costRank(a.p.model) - costRank(b.p.model) || a.i - b.i)
      .map(({ p }) => p);

    const preference = this.routing[taskType] ?? AUTO;
    if (preference === AUTO) return this.fallbackEnabled ? available : available.slice(0, 1);

    const preferred = available.find((p) => p.name === preference);
    if (!this.fallbackEnabled) return preferred ? [preferred] : [];
    if (!preferred) return available;
    return [preferred, ...available.filter((p) => p !== preferred)];
  }

  selectProvider(taskType: string): AIProvider | null {
    return this.candidatesFor(taskType)[0] ?? null;
  }

  async route(taskType: string, prompt: string, opts: RouteOptions = {}): Promise<AIResponse> {
    const candidates = this.candidatesFor(taskType);

    if (candidates.length === 0) {
      this.log.warn("AI request has no provider", { taskType, registered: this.providerNames() });
      return this.unavailable(taskType);
    }

    let last: AIResponse | null = null;
    let sawTransient = false;

    for (const provider of candidates) {
      const res = await this.call(provider, taskType, prompt, opts);
      if (res.success) return res;
      if (res.errorKind === "transient") sawTransient = true;
      last = res;
    }

    // Every candidate failed; transient wins so callers know a retry may help.
    const failed = last ?? this.unavailable(taskType);
    return { ...failed, errorKind: sawTransient ? "transient" : failed.errorKind };
  }

  getUsage(): Record<string, ProviderUsage> {
    return Object.fromEntries(this.usage.entries());
  }

  private async call(provider: AIProvider, taskType: string, prompt: string, opts: RouteOptions): Promise<AIResponse> {
    const started = Date.now();
    try {
      const out = opts.requireJson
        ? await provider.generateJson(prompt, opts)
        : await provider.generateText(prompt, opts);

      if (!out.content.trim()) throw new ProviderRequestError(provider.name, 502, "empty completion");

      const costEstimate = provider.estimateCost(out.inputTokens, out.outputTokens);
      const res: AIResponse = {
        content: out.content,
        provider: provider.name,
        model: out.model,
        taskType,
        inputTokens: out.inputTokens,
        outputTokens: out.outputTokens,
        costEstimate,
        latencyMs: Date.now() - started,
        success: true
      };

      this.consecutiveFailures.set(provider.name, 0);
      this.record(provider.name, res);
      this.log.info("AI request", {
        taskType,
        provider: res.provider,
        model: res.model,
        inputTokens: res.inputTokens,
        outputTokens: res.outputTokens,
        costEstimate: Number(costEstimate.toFixed(6)),
        latencyMs: res.latencyMs,
        success: true
      });
      return res;
    } catch (err) {
      const errorKind: AIErrorKind = err instanceof ProviderRequestError && !err.transient ? "fatal" : "transient";
      const failures = (this.consecutiveFailures.get(provider.name) ?? 0) + 1;
      this.consecutiveFailures.set(provider.name, failures);

      const res: AIResponse = {
        content: "",
        provider: provider.name,
        model: provider.model,
        taskType,
        inputTokens: 0,
        outputTokens: 0,
        costEstimate: 0,
        latencyMs: Date.now() - started,
        success: false,
        error: errorMessage(err),
        errorKind
      };
      this.record(provider.name, res);
      this.log.warn("AI request failed", {
        taskType,
        provider: provider.name,
        errorKind,
        consecutiveFailures: failures,
        circuitOpen: failures >= this.failureThreshold,
        error: res.error
      });
      return res;
    }
  }

  private record(name: string, res: AIResponse) {
    const cur = this.usage.get(name) ?? { requests: 0, failures: 0, inputTokens: 0, outputTokens: 0, costEstimate: 0 };
    cur.requests += 1;
    if (!res.success) cur.failures += 1;
    cur.inputTokens += res.inputTokens;
    cur.outputTokens += res.outputTokens;
    cur.costEstimate += res.costEstimate;
    this.usage.set(name, cur);
  }

  private unavailable(taskType: string): AIResponse {
    return {
      content: "",
      provider: "none",
      model: "none",
      taskType,
      inputTokens: 0,
      outputTokens: 0,
      costEstimate: 0,
      latencyMs: 0,
      success: false,
      error: "No AI provider available for this task.",
      errorKind: "unavailable"
    };
  }
}
