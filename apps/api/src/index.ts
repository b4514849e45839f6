import "dotenv/config";
import { ExtractionAgent } from "./agents/extractor";
import { createApp } from "./app";
import { createRouter } from "./llm";
import { LoggingAlertDispatcher } from "./services/alerts";
import { ChangeDetector } from "./services/changeDetector";
import { loadCompetitors } from "./services/competitors";
import { env } from "./services/env";
import { WebEvidenceSource } from "./services/evidence";
import { ClaimLedger } from "./services/ledger";
import { errorMessage, logError, logInfo } from "./services/logger";
import { createRateLimiter } from "./services/rateLimit";
import { RefreshScheduler } from "./services/refresh";

const competitors = loadCompetitors(env.COMPETITORS_FILE);
const ledger = new ClaimLedger(env.LEDGER_DB_PATH, { minScore: env.CLAIM_MIN_SCORE });
const router = createRouter(env);

const scheduler = new RefreshScheduler({
  ledger,
  router,
  extractor: new ExtractionAgent({
    router,
    maxChars: env.EXTRACTION_MAX_CHARS,
    maxAttempts: env.EXTRACTION_MAX_ATTEMPTS,
    retryBaseMs: env.EXTRACTION_RETRY_BASE_MS
  }),
  evidence: new WebEvidenceSource(),
  detector: new ChangeDetector({ store: ledger }),
  alerts: new LoggingAlertDispatcher(),
  concurrency: env.REFRESH_CONCURRENCY,
  staggerMs: env.REFRESH_STAGGER_MS,
  timeoutMs: env.REFRESH_JOB_TIMEOUT_MS
});

const app = createApp({
  ledger,
  scheduler,
  competitors,
  rateLimiter: createRateLimiter(env.RATE_LIMIT_PER_MINUTE),
  corsOrigin: env.CORS_ORIGIN
});

const server = app.listen(Number(env.PORT), () => {
  logInfo(`API listening on http://localhost:${env.PORT}`, { competitors: competitors.length });
});

async function refreshOnStart(): Promise<void> {
  if (env.REFRESH_ON_START === "off") return;
  const result =
    env.REFRESH_ON_START === "all" ? await scheduler.runAll(competitors) : await scheduler.resumeInterrupted(competitors);
  if (result) logInfo("Startup refresh complete", { succeeded: result.succeeded, failed: result.failed });
}

refreshOnStart().catch((err) => logError("Startup refresh failed", { error: errorMessage(err) }));

function shutdown(signal: string) {
  logInfo("Shutting down", { signal });
  server.close(() => {
    ledger.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
