import { env } from "../services/env";
import { ProviderRequestError } from "../services/errors";
import { jsonOnlySystemPrompt } from "./jsonSchema";
import { estimateCost } from "./pricing";
import { toMessages, type AIProvider, type ChatMessage, type GenerateOptions, type ProviderResult } from "./provider";

export type ChatCompletionsConfig = {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
};

type ChatCompletionsResponse = {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
};

/**
 * OpenAI-style Chat Completions wrapper. OpenRouter speaks the same format.
 */
export class OpenAIProvider implements AIProvider {
  readonly name: string;
  readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(config?: Partial<ChatCompletionsConfig>) {
    this.name = config?.name ?? "openai";
    this.baseUrl = config?.baseUrl ?? "https://api.openai.com/v1";
    this.apiKey = config?.apiKey ?? env.OPENAI_API_KEY ?? "";
    this.model = config?.model ?? env.OPENAI_MODEL;
    this.headers = config?.headers ?? {};
    this.timeoutMs = config?.timeoutMs ?? 60_000;
    if (!this.apiKey) throw new Error(`${this.name}: API key is not set.`);
  }

  async generateText(prompt: string, opts?: GenerateOptions): Promise<ProviderResult> {
    return this.complete(toMessages(prompt, opts), opts, false);
  }

  async generateJson(prompt: string, opts?: GenerateOptions): Promise<ProviderResult> {
    const system = jsonOnlySystemPrompt(opts?.systemPrompt ?? "a single JSON object");
    return this.complete(toMessages(prompt, { ...opts, systemPrompt: system }), opts, true);
  }

  estimateCost(inputTokens: number, outputTokens: number): number {
    return estimateCost(this.model, inputTokens, outputTokens);
  }

  private async complete(messages: ChatMessage[], opts: GenerateOptions | undefined, json: boolean) {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          ...this.headers
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: opts?.temperature ?? 0.1,
          ...(opts?.maxTokens ? { max_tokens: opts.maxTokens } : {}),
          ...(json ? { response_format: { type: "json_object" } } : {}),
          stream: false
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new ProviderRequestError(this.name, 0, err instanceof Error ? err.message : String(err));
    }

    if (!res.ok) throw new ProviderRequestError(this.name, res.status, await res.text());

    const data = (await res.json()) as ChatCompletionsResponse;
    return {
      content: data.choices?.[0]?.message?.content ?? "",
      model: data.model ?? this.model,
      inputTokens: data.usage?.prompt_tokens ?? 0,
      outputTokens: data.usage?.completion_tokens ?? 0
    };
  }
}
