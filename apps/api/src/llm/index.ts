import { env as defaultEnv, type Env } from "../services/env";
import { logInfo } from "../services/logger";
import type { AIProvider } from "./provider";
import { OllamaProvider } from "./ollama";
import { OpenAIProvider } from "./openai";
import { OpenRouterProvider } from "./openrouter";
import { AIRouter, DEFAULT_ROUTING } from "./router";

/**
 * Backends are registered from explicit configuration only. A backend without
 * credentials is absent, and the router reports "no provider" for it.
 */
export function createProviders(env: Env = defaultEnv): AIProvider[] {
  const providers: AIProvider[] = [];
  if (env.OPENAI_API_KEY) providers.push(new OpenAIProvider({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL }));
  if (env.OPENROUTER_API_KEY) {
    providers.push(new OpenRouterProvider({ apiKey: env.OPENROUTER_API_KEY, model: env.OPENROUTER_MODEL }));
  }
  if (env.OLLAMA_ENABLED) providers.push(new OllamaProvider({ baseUrl: env.OLLAMA_BASE_URL, model: env.OLLAMA_MODEL }));
  return providers;
}

/**
 * AI_PROVIDER=hybrid keeps the per-task table; a single provider name pins
 * every task to it. AI_ROUTING entries are applied last.
 */
export function resolveRouting(env: Env = defaultEnv): Record<string, string> {
  const base =
    env.AI_PROVIDER === "hybrid"
      ? { ...DEFAULT_ROUTING }
      : Object.fromEntries(Object.keys(DEFAULT_ROUTING).map((task) => [task, env.AI_PROVIDER]));
  return { ...base, ...env.AI_ROUTING };
}

export function createRouter(env: Env = defaultEnv, providers: AIProvider[] = createProviders(env)): AIRouter {
  const router = new AIRouter({
    providers,
    routing: resolveRouting(env),
    fallbackEnabled: env.AI_FALLBACK_ENABLED,
    failureThreshold: env.AI_FAILURE_THRESHOLD
  });
  logInfo("AI router configured", {
    providers: router.providerNames(),
    mode: env.AI_PROVIDER,
    fallbackEnabled: env.AI_FALLBACK_ENABLED
  });
  return router;
}
