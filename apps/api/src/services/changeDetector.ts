import { createId } from "@paralleldrive/cuid2";
import type { ChangeEvent, Claim, ClaimPayload, Severity } from "../types/claims";
import { canonicalJson } from "./confidence";
import { logger as defaultLogger, type Logger } from "./logger";

export const FIELD_IMPORTANCE: Record<string, Severity> = {
  pricing_model: "high",
  base_price: "high",
  price_unit: "high",
  funding_total: "high",
  customer_count: "high",
  feature_name: "medium",
  feature_category: "medium",
  is_premium: "medium",
  integration_partners: "medium",
  target_segments: "medium",
  value_propositions: "medium",
  differentiators: "medium"
};

const RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2 };

export type FieldChange = { field: string; before: unknown; after: unknown };

/** Subset of the ledger the detector writes to. */
export type ChangeEventStore = {
  hasChangeEvent(dedupKey: string): boolean;
  recordChangeEvent(event: ChangeEvent, dedupKey: string): boolean;
};

export function changeDedupKey(previousId: string | null, newId: string): string {
  return `${previousId ?? "none"}|${newId}`;
}

export function diffPayloads(before: ClaimPayload, after: ClaimPayload): FieldChange[] {
  const fields = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  return fields
    .filter((f) => canonicalJson(before[f]) !== canonicalJson(after[f]))
    .map((field) => ({ field, before: before[field] ?? null, after: after[field] ?? null }));
}

export function classifySeverity(changes: FieldChange[]): Severity {
  let severity: Severity = "low";
  for (const c of changes) {
    const s = FIELD_IMPORTANCE[c.field] ?? "low";
    if (RANK[s] > RANK[severity]) severity = s;
  }
  return severity;
}

function show(v: unknown): string {
  return typeof v === "string" ? v : JSON.stringify(v ?? null);
}

export function summarizeChange(claim: Claim, changes: FieldChange[], created: boolean): string {
  const subject = `${claim.competitorId} ${claim.claimType}${claim.claimSubtype ? ` (${claim.claimSubtype})` : ""}`;
  if (created) {
    const set = changes.filter((c) => c.after !== null).map((c) => `${c.field}=${show(c.after)}`);
    return `${subject} added: ${set.join(", ") || "no fields"}`;
  }
  return `${subject} changed: ${changes.map((c) => `${c.field} ${show(c.before)} -> ${show(c.after)}`).join("; ")}`;
}

export type ChangeDetectorOptions = {
  store: ChangeEventStore;
  now?: () => Date;
  logger?: Logger;
};

/**
 * Diffs the previous active claim against the one that replaced it and
 * persists one event per (previous, new) pair.
 */
export class ChangeDetector {
  private readonly store: ChangeEventStore;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(opts: ChangeDetectorOptions) {
    this.store = opts.store;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.logger ?? defaultLogger;
  }

  detect(previous: Claim | null, next: Claim): ChangeEvent | null {
    if (next.status !== "active") return null;
    if (previous && previous.id === next.id) return null;

    const changes = diffPayloads(previous?.claimData ?? {}, next.claimData);
    if (previous && changes.length === 0) return null;

    const dedupKey = changeDedupKey(previous?.id ?? null, next.id);
    if (this.store.hasChangeEvent(dedupKey)) return null;

    const created = previous === null;
    const event: ChangeEvent = {
      id: createId(),
      competitorId: next.competitorId,
      previousClaimId: previous?.id ?? null,
      newClaimId: next.id,
      changeType: `${next.claimType}_${created ? "added" : "change"}`,
      severity: created ? "low" : classifySeverity(changes),
      summary: summarizeChange(next, changes, created),
      previousValue: previous?.claimData ?? null,
      newValue: next.claimData,
      detectedAt: this.now()
    };

    if (!this.store.recordChangeEvent(event, dedupKey)) return null;

    this.log.info("Change detected", {
      competitorId: event.competitorId,
      changeType: event.changeType,
      severity: event.severity,
      fields: changes.map((c) => c.field)
    });
    return event;
  }
}
