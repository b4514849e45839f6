import cors from "cors";
import express from "express";
import { claimsRouter } from "./routes/claims";
import { confidenceRouter } from "./routes/confidence";
import { errorHandler } from "./routes/errors";
import { refreshRouter } from "./routes/refresh";
import type { CompetitorConfig } from "./services/competitors";
import type { ClaimLedger } from "./services/ledger";
import { rateLimitMiddleware, type RateLimiter } from "./services/rateLimit";
import type { RefreshScheduler } from "./services/refresh";

export type AppDeps = {
  ledger: ClaimLedger;
  scheduler: RefreshScheduler;
  competitors: CompetitorConfig[];
  rateLimiter: RateLimiter;
  corsOrigin: string;
};

/**
 * Express API:
 * - CORS locked to the configured origin
 * - rate limiting per IP (health check exempt)
 * - ClaimwatchError codes mapped to HTTP statuses
 */
export function createApp(deps: AppDeps) {
  const app = express();

  app.use(
    cors({
      origin: deps.corsOrigin,
      credentials: false
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true, refreshing: deps.scheduler.isRunning() }));

  app.use(rateLimitMiddleware(deps.rateLimiter));

  app.use(claimsRouter(deps.ledger));
  app.use(confidenceRouter());
  app.use(refreshRouter(deps.scheduler, deps.competitors));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found", code: "not_found" });
  });

  app.use(errorHandler);

  return app;
}
