import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { claimKeyOf } from "../types/claims";
import { ValidationError } from "../services/errors";
import type { ClaimLedger } from "../services/ledger";
import { changeEventJson, claimJson } from "./serialize";

const StatusQuerySchema = z.enum(["active", "superseded", "review_required", "rejected"]).optional();

const OverrideSchema = z.object({
  action: z.enum(["reject", "activate"]),
  notes: z.string().max(2000).optional()
});

function param(req: Request, name: string): string {
  const raw = req.params[name];
  if (!raw) throw new ValidationError(`Missing ${name}`);
  return raw;
}

/**
 * Read and override endpoints over the claim ledger. Ledger calls are
 * synchronous; thrown errors go to the error middleware.
 */
export function claimsRouter(ledger: ClaimLedger): Router {
  const router = Router();

  router.get("/api/competitors/:competitorId/claims", (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = StatusQuerySchema.safeParse(req.query.status || undefined);
      if (!status.success) throw new ValidationError("status must be one of active, superseded, review_required, rejected");
      const claims = ledger.listClaims(param(req, "competitorId"), status.data);
      res.json({ claims: claims.map(claimJson) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/api/competitors/:competitorId/changes", (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ changes: ledger.listChangeEvents(param(req, "competitorId")).map(changeEventJson) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/api/claims/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = param(req, "id");
      const claim = ledger.getClaim(id);
      if (!claim) {
        res.status(404).json({ error: `Claim ${id} not found`, code: "claim_not_found" });
        return;
      }
      res.json(claimJson(claim));
    } catch (err) {
      next(err);
    }
  });

  /**
   * Supersession chain from this claim forward, plus every version for its key.
   */
  router.get("/api/claims/:id/history", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = param(req, "id");
      const claim = ledger.getClaim(id);
      if (!claim) {
        res.status(404).json({ error: `Claim ${id} not found`, code: "claim_not_found" });
        return;
      }
      res.json({
        chain: ledger.followChain(id).map(claimJson),
        versions: ledger.history(claimKeyOf(claim)).map(claimJson)
      });
    } catch (err) {
      next(err);
    }
  });

  router.post("/api/claims/:id/override", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = OverrideSchema.safeParse(req.body);
      if (!body.success) throw new ValidationError('Body must be {"action": "reject" | "activate", "notes"?: string}');
      const id = param(req, "id");
      const notes = body.data.notes ?? null;

      if (body.data.action === "reject") {
        res.json({ claim: claimJson(ledger.reject(id, notes)), previous: null });
        return;
      }
      const { claim, previous } = ledger.forceActivate(id, notes);
      res.json({ claim: claimJson(claim), previous: previous ? claimJson(previous) : null });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
