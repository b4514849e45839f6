import { readFileSync } from "node:fs";
import { z } from "zod";
import { CLAIM_SCHEMAS } from "../agents/schemas";
import { ValidationError } from "./errors";

const ClaimTargetSchema = z.union([
  z.string().min(1).transform((type) => ({ type, subtype: null })),
  z.object({ type: z.string().min(1), subtype: z.string().min(1).nullable().default(null) })
]);

const CompetitorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  claim_types: z.array(ClaimTargetSchema).default(Object.keys(CLAIM_SCHEMAS)),
  sources: z
    .array(
      z.object({
        url: z.string().url(),
        source_type: z.string().min(1)
      })
    )
    .default([])
});

const CompetitorListSchema = z.array(CompetitorSchema).superRefine((list, ctx) => {
  const seen = new Set<string>();
  list.forEach((c, i) => {
    if (seen.has(c.id)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "id"], message: `duplicate id ${c.id}` });
    seen.add(c.id);
    c.claim_types.forEach((t, j) => {
      if (!CLAIM_SCHEMAS[t.type]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, "claim_types", j], message: `unknown claim type ${t.type}` });
      }
    });
  });
});

export type ClaimTarget = { type: string; subtype: string | null };

export type CompetitorConfig = {
  id: string;
  name: string;
  claimTypes: ClaimTarget[];
  sources: Array<{ url: string; sourceType: string }>;
};

export function parseCompetitors(raw: unknown): CompetitorConfig[] {
  const parsed = CompetitorListSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(`Invalid competitors config: ${issues.join("; ")}`);
  }
  return parsed.data.map((c) => ({
    id: c.id,
    name: c.name,
    claimTypes: c.claim_types,
    sources: c.sources.map((s) => ({ url: s.url, sourceType: s.source_type }))
  }));
}

export function loadCompetitors(path: string): CompetitorConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ValidationError(`Cannot read competitors file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCompetitors(raw);
}
