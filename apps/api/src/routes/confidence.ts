import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import {
  calculateConfidenceScore,
  CREDIBILITY_DESCRIPTIONS,
  describeSourceType,
  normalizeSourceType,
  RELIABILITY_DESCRIPTIONS
} from "../services/confidence";
import { ValidationError } from "../services/errors";
import { breakdownJson } from "./serialize";

const ScoreReqSchema = z.object({
  source_type: z.string().min(1),
  reliability: z.string().optional(),
  credibility: z.number().optional(),
  corroborating_sources: z.number().optional(),
  data_age_days: z.number().optional()
});

/**
 * POST /api/confidence/score
 * Scores one source the way triangulation does and returns the breakdown.
 */
export function confidenceRouter(): Router {
  const router = Router();

  router.post("/api/confidence/score", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ScoreReqSchema.safeParse(req.body);
      if (!body.success) throw new ValidationError("Body must include source_type");
      const b = body.data;
      const result = calculateConfidenceScore({
        sourceType: b.source_type,
        reliability: b.reliability,
        credibility: b.credibility,
        corroboratingSources: b.corroborating_sources,
        dataAgeDays: b.data_age_days
      });
      const sourceType = normalizeSourceType(b.source_type);
      res.json({
        source_type: sourceType,
        source_description: describeSourceType(sourceType),
        reliability: result.reliability,
        reliability_description: RELIABILITY_DESCRIPTIONS[result.reliability],
        credibility: result.credibility,
        credibility_description: CREDIBILITY_DESCRIPTIONS[result.credibility],
        score: result.score,
        level: result.level,
        explanation: result.explanation,
        breakdown: breakdownJson(result.breakdown)
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
