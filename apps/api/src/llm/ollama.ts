import { env } from "../services/env";
import { ProviderRequestError } from "../services/errors";
import { jsonOnlySystemPrompt } from "./jsonSchema";
import { estimateCost } from "./pricing";
import { toMessages, type AIProvider, type ChatMessage, type GenerateOptions, type ProviderResult } from "./provider";

type OllamaChatResponse = {
  model?: string;
  message?: { content?: string };
  response?: string;
  prompt_eval_count?: number;
  eval_count?: number;
};

/**
 * Ollama Chat API wrapper. Local models are priced at zero, so "auto" prefers
 * this backend whenever it is enabled.
 */
export class OllamaProvider implements AIProvider {
  readonly name = "ollama";
  readonly model: string;
  private baseUrl: string;

  constructor(opts?: { baseUrl?: string; model?: string }) {
    this.baseUrl = opts?.baseUrl ?? env.OLLAMA_BASE_URL;
    this.model = opts?.model ?? env.OLLAMA_MODEL;
  }

  private options(opts?: GenerateOptions) {
    return {
      temperature: opts?.temperature ?? 0.1,
      ...(opts?.maxTokens ? { num_predict: opts.maxTokens } : {}),
      ...(process.env.OLLAMA_TOP_P ? { top_p: Number(process.env.OLLAMA_TOP_P) } : {})
    };
  }

  async generateText(prompt: string, opts?: GenerateOptions): Promise<ProviderResult> {
    return this.chat(toMessages(prompt, opts), opts, false);
  }

  async generateJson(prompt: string, opts?: GenerateOptions): Promise<ProviderResult> {
    const system = jsonOnlySystemPrompt(opts?.systemPrompt ?? "a single JSON object");
    return this.chat(toMessages(prompt, { ...opts, systemPrompt: system }), opts, true);
  }

  estimateCost(inputTokens: number, outputTokens: number): number {
    return estimateCost(this.model, inputTokens, outputTokens);
  }

  private async chat(messages: ChatMessage[], opts: GenerateOptions | undefined, json: boolean) {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages,
          stream: false,
          ...(json ? { format: "json" } : {}),
          options: this.options(opts)
        }),
        signal: AbortSignal.timeout(120_000)
      });
    } catch (err) {
      throw new ProviderRequestError(this.name, 0, err instanceof Error ? err.message : String(err));
    }

    if (!res.ok) throw new ProviderRequestError(this.name, res.status, await res.text());

    const data = (await res.json()) as OllamaChatResponse;

    // Chat shape first, legacy generate shape second.
    return {
      content: data.message?.content ?? data.response ?? "",
      model: data.model ?? this.model,
      inputTokens: data.prompt_eval_count ?? 0,
      outputTokens: data.eval_count ?? 0
    };
  }
}
