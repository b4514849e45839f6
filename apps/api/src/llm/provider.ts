export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerateOptions = {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
};

/**
 * What a backend returns for one call. Token counts come from the backend's
 * usage block; 0 when it reports none.
 */
export type ProviderResult = {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
};

/**
 * Fixed capability surface shared by every backend. A backend that cannot be
 * used is simply not registered with the router.
 */
export interface AIProvider {
  readonly name: string;
  readonly model: string;

  generateText(prompt: string, opts?: GenerateOptions): Promise<ProviderResult>;

  /**
   * Same as generateText, but the backend is put in JSON mode and instructed to
   * emit only JSON. The content is returned unparsed.
   */
  generateJson(prompt: string, opts?: GenerateOptions): Promise<ProviderResult>;

  estimateCost(inputTokens: number, outputTokens: number): number;
}

export type AIErrorKind = "unavailable" | "transient" | "fatal";

export type AIResponse = {
  content: string;
  provider: string;
  model: string;
  taskType: string;
  inputTokens: number;
  outputTokens: number;
  costEstimate: number;
  latencyMs: number;
  success: boolean;
  error?: string;
  errorKind?: AIErrorKind;
};

export function toMessages(prompt: string, opts?: GenerateOptions): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (opts?.systemPrompt) messages.push({ role: "system", content: opts.systemPrompt });
  messages.push({ role: "user", content: prompt });
  return messages;
}
