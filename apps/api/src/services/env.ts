import { z } from "zod";

const bool = (def: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(def)
    .transform((v) => v === "true" || v === "1");

const int = (def: number) => z.coerce.number().int().nonnegative().default(def);

const RoutingSchema = z.record(z.string().min(1));

const EnvSchema = z.object({
  PORT: z.string().default("8787"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  AI_PROVIDER: z.enum(["hybrid", "openai", "openrouter", "ollama"]).default("hybrid"),
  AI_ROUTING: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (!raw) return {};
      try {
        return RoutingSchema.parse(JSON.parse(raw));
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "AI_ROUTING must be a JSON object of task_type -> provider" });
        return z.NEVER;
      }
    }),
  AI_FALLBACK_ENABLED: bool("true"),
  AI_FAILURE_THRESHOLD: int(3),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),

  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().default("anthropic/claude-3.5-sonnet"),

  OLLAMA_ENABLED: bool("false"),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("llama3.1"),

  LEDGER_DB_PATH: z.string().default("./data/claims.db"),
  CLAIM_MIN_SCORE: z.coerce.number().int().min(0).max(100).default(40),

  EXTRACTION_MAX_CHARS: int(12000),
  EXTRACTION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  EXTRACTION_RETRY_BASE_MS: int(1000),

  REFRESH_CONCURRENCY: z.coerce.number().int().min(1).default(3),
  REFRESH_STAGGER_MS: int(500),
  REFRESH_JOB_TIMEOUT_MS: z.coerce.number().int().min(1).default(120000),
  COMPETITORS_FILE: z.string().default("./config/competitors.json"),
  REFRESH_ON_START: z.enum(["off", "interrupted", "all"]).default("interrupted"),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(30),
  UPSTASH_REDIS_REST_URL: z.string().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  // Blank values in .env files mean "unset".
  const cleaned = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v !== ""));
  return EnvSchema.parse(cleaned);
}

export const env = parseEnv(process.env);
