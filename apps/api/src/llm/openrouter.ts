import { env } from "../services/env";
import { OpenAIProvider } from "./openai";

/**
 * OpenRouter Chat Completions wrapper.
 */
export class OpenRouterProvider extends OpenAIProvider {
  constructor(opts?: { apiKey?: string; model?: string }) {
    super({
      name: "openrouter",
      baseUrl: "https://openrouter.ai/api/v1",
      apiKey: opts?.apiKey ?? env.OPENROUTER_API_KEY ?? "",
      model: opts?.model ?? env.OPENROUTER_MODEL,
      headers: {
        "HTTP-Referer": "http://localhost",
        "X-Title": "Claimwatch"
      }
    });
  }
}
