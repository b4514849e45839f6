import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { CompetitorConfig } from "../services/competitors";
import { ValidationError } from "../services/errors";
import type { RefreshScheduler } from "../services/refresh";
import { changeEventJson } from "./serialize";

const RefreshReqSchema = z.object({
  competitor_ids: z.array(z.string().min(1)).optional()
});

/**
 * POST /api/refresh
 * Runs a refresh for all configured competitors, or the listed ones, and
 * returns per-job results and provider usage.
 */
export function refreshRouter(scheduler: RefreshScheduler, competitors: CompetitorConfig[]): Router {
  const router = Router();

  router.post("/api/refresh", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = RefreshReqSchema.safeParse(req.body ?? {});
      if (!parsed.success) throw new ValidationError('Body must be {"competitor_ids"?: string[]}');

      const ids = parsed.data.competitor_ids;
      const selected = ids ? competitors.filter((c) => ids.includes(c.id)) : competitors;
      const unknown = ids?.filter((id) => !competitors.some((c) => c.id === id)) ?? [];
      if (unknown.length > 0) throw new ValidationError(`Unknown competitor ids: ${unknown.join(", ")}`);

      const result = await scheduler.runAll(selected);
      res.json({
        succeeded: result.succeeded,
        failed: result.failed,
        timed_out: result.timedOut,
        usage: result.usage,
        jobs: result.jobs.map((j) => ({
          job_id: j.jobId,
          competitor_id: j.competitorId,
          status: j.status,
          counts: j.counts,
          error: j.error,
          error_code: j.errorCode,
          duration_ms: j.durationMs,
          events: j.events.map(changeEventJson)
        }))
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
