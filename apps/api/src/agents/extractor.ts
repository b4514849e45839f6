import { z } from "zod";
import { parseJsonLenient } from "../llm/jsonSchema";
import type { AIRouter } from "../llm/router";
import { ExtractionParseError, ProviderUnavailableError, TransientProviderError } from "../services/errors";
import { logger as defaultLogger, type Logger } from "../services/logger";
import { answerShape, type ClaimSchema, type ExtractedFields } from "./schemas";

const FieldAnswerSchema = z.object({
  value: z.unknown().optional(),
  quote: z.string().nullable().optional()
});

const AnswerSchema = z.object({
  fields: z.record(FieldAnswerSchema),
  reasoning: z.string().nullable().optional()
});

type Answer = z.infer<typeof AnswerSchema>;

export type ExtractionContext = {
  competitorName: string;
  claimSubtype?: string | null;
  sourceType?: string;
  sourceUrl?: string | null;
};

export type Candidate = {
  claimType: string;
  claimSubtype: string | null;
  fields: ExtractedFields;
  evidenceQuotes: Record<string, string | null>;
  evidenceQuote: string | null;
  reasoning: string | null;
  rawConfidence: number;
  /** review_required: the model never produced parseable output; rawText holds its last reply. */
  status: "extracted" | "review_required";
  rawText: string | null;
  parseError: string | null;
  provider: string;
  model: string;
  attempts: number;
  truncated: boolean;
};

export type ExtractionAgentOptions = {
  router: AIRouter;
  taskType?: string;
  maxChars?: number;
  maxAttempts?: number;
  retryBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function normalizeForMatch(s: string): string {
  return s.toLowerCase().replace(/\s+/g, " ").trim();
}

export function quoteSupported(quote: string | null | undefined, evidence: string): quote is string {
  if (!quote || !quote.trim()) return false;
  return normalizeForMatch(evidence).includes(normalizeForMatch(quote));
}

export function hasAnyValue(fields: ExtractedFields): boolean {
  return Object.values(fields).some((v) => v !== null && v !== undefined);
}

/**
 * Pre-triangulation confidence (0..1) from extraction quality alone.
 */
export function rawConfidence(
  schema: ClaimSchema,
  fields: ExtractedFields,
  evidenceQuote: string | null,
  reasoning: string | null
): number {
  let c = 0.5;
  if (evidenceQuote) c += 0.2;
  if (reasoning) c += 0.1;
  c += schema.bonus(fields);
  return Math.round(Math.min(c, 1) * 100) / 100;
}

export function buildPrompt(schema: ClaimSchema, evidence: string, ctx: ExtractionContext): string {
  return [
    "You are a competitive intelligence analyst.",
    `Extract ${schema.claimType} facts about ${ctx.competitorName} from the evidence below.`,
    schema.description,
    "",
    "Fields:",
    ...schema.fields.map((f) => `- ${f.name}: ${f.hint}`),
    "",
    "Rules:",
    '- Return every field as {"value": ..., "quote": ...}.',
    "- quote MUST be copied exactly from the evidence and must support the value.",
    '- If the evidence does not state a field, return {"value": null, "quote": null}. Do not guess.',
    "- reasoning: one or two sentences on how the values were found.",
    "",
    `EVIDENCE (source: ${ctx.sourceType ?? "unknown"}${ctx.sourceUrl ? `, ${ctx.sourceUrl}` : ""}):`,
    evidence
  ].join("\n");
}

/**
 * Turns evidence text into a schema-shaped candidate claim via the router.
 *
 * Never guesses: a field survives only with a quote that occurs in the evidence.
 * Transient router failures and unparseable replies are retried with
 * exponential backoff; a reply that never parses comes back as a
 * review_required candidate carrying the raw text.
 */
export class ExtractionAgent {
  private readonly router: AIRouter;
  private readonly taskType: string;
  private readonly maxChars: number;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(opts: ExtractionAgentOptions) {
    this.router = opts.router;
    this.taskType = opts.taskType ?? "data_extraction";
    this.maxChars = opts.maxChars ?? 12_000;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
    this.retryBaseMs = opts.retryBaseMs ?? 1000;
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = opts.logger ?? defaultLogger;
  }

  async extract(evidenceText: string, schema: ClaimSchema, ctx: ExtractionContext): Promise<Candidate> {
    const truncated = evidenceText.length > this.maxChars;
    const evidence = truncated ? evidenceText.slice(0, this.maxChars) : evidenceText;
    const prompt = buildPrompt(schema, evidence, ctx);

    let lastTransient = "";
    let lastUnparsed: { error: ExtractionParseError; provider: string; model: string } | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const res = await this.router.route(this.taskType, prompt, {
        requireJson: true,
        systemPrompt: answerShape(schema),
        temperature: 0.1
      });

      if (!res.success) {
        if (res.errorKind === "unavailable") throw new ProviderUnavailableError(res.error);
        if (res.errorKind === "fatal") throw new ProviderUnavailableError(`${res.provider}: ${res.error ?? "request rejected"}`);
        lastTransient = res.error ?? "transient failure";
        lastUnparsed = null;
      } else {
        try {
          const answer = this.parseAnswer(res.content);
          return this.toCandidate(schema, answer, evidence, ctx, {
            provider: res.provider,
            model: res.model,
            attempts: attempt,
            truncated
          });
        } catch (err) {
          if (!(err instanceof ExtractionParseError)) throw err;
          lastUnparsed = { error: err, provider: res.provider, model: res.model };
          this.log.warn("Extraction reply not parseable", {
            claimType: schema.claimType,
            competitor: ctx.competitorName,
            attempt,
            provider: res.provider,
            error: err.message
          });
        }
      }

      if (attempt < this.maxAttempts) await this.sleep(this.retryBaseMs * 2 ** (attempt - 1));
    }

    if (lastUnparsed) {
      return {
        claimType: schema.claimType,
        claimSubtype: ctx.claimSubtype ?? null,
        fields: Object.fromEntries(schema.fields.map((f) => [f.name, null])),
        evidenceQuotes: Object.fromEntries(schema.fields.map((f) => [f.name, null])),
        evidenceQuote: null,
        reasoning: null,
        rawConfidence: 0,
        status: "review_required",
        rawText: lastUnparsed.error.rawText,
        parseError: lastUnparsed.error.message,
        provider: lastUnparsed.provider,
        model: lastUnparsed.model,
        attempts: this.maxAttempts,
        truncated
      };
    }

    throw new TransientProviderError(this.maxAttempts, lastTransient);
  }

  private parseAnswer(content: string): Answer {
    const parsed = parseJsonLenient(content);
    if (!parsed.ok) throw new ExtractionParseError(`Reply is not JSON: ${parsed.error}`, content);
    const answer = AnswerSchema.safeParse(parsed.value);
    if (!answer.success) {
      throw new ExtractionParseError(`Reply does not match the answer shape: ${answer.error.issues[0]?.message}`, content);
    }
    return answer.data;
  }

  private toCandidate(
    schema: ClaimSchema,
    answer: Answer,
    evidence: string,
    ctx: ExtractionContext,
    meta: { provider: string; model: string; attempts: number; truncated: boolean }
  ): Candidate {
    const fields: ExtractedFields = {};
    const quotes: Record<string, string | null> = {};

    for (const spec of schema.fields) {
      const a = answer.fields[spec.name];
      const typed = spec.schema.safeParse(a?.value);
      if (a && typed.success && quoteSupported(a.quote, evidence)) {
        fields[spec.name] = typed.data;
        quotes[spec.name] = a.quote.trim();
      } else {
        fields[spec.name] = null;
        quotes[spec.name] = null;
      }
    }

    const evidenceQuote = schema.fields.map((f) => quotes[f.name]).find((q): q is string => q !== null) ?? null;
    const reasoning = answer.reasoning?.trim() || null;

    return {
      claimType: schema.claimType,
      claimSubtype: ctx.claimSubtype ?? null,
      fields,
      evidenceQuotes: quotes,
      evidenceQuote,
      reasoning,
      rawConfidence: rawConfidence(schema, fields, evidenceQuote, reasoning),
      status: "extracted",
      rawText: null,
      parseError: null,
      ...meta
    };
  }
}
