import { createHash } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createId } from "@paralleldrive/cuid2";
import Database from "better-sqlite3";
import {
  formatClaimKey,
  levelFromScore,
  type ChangeEvent,
  type Claim,
  type ClaimKey,
  type ClaimPayload,
  type ClaimStatus,
  type Severity
} from "../types/claims";
import { canonicalJson } from "./confidence";
import { ClaimNotFoundError, ConcurrentSupersessionConflictError, ValidationError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export type CommitInput = ClaimKey & {
  claimData: ClaimPayload;
  evidenceIds: string[];
  evidenceHashes: string[];
  evidenceQuote: string | null;
  score: number;
  /** Active claim id observed when the job started; null when there was none. */
  expectedActiveId: string | null;
  extractionModel?: string | null;
  extractionReasoning?: string | null;
  /** Set for unparseable extractions: the claim is parked for review with the raw model reply. */
  rawText?: string | null;
  forceReview?: boolean;
};

export type CommitOutcome = "created" | "superseded" | "unchanged" | "review_required" | "duplicate";

export type CommitResult = {
  outcome: CommitOutcome;
  /** The claim inserted by this commit, or the current active claim for unchanged/duplicate. */
  claim: Claim | null;
  previous: Claim | null;
};

export type OverrideResult = {
  claim: Claim;
  /** Active claim displaced by a forced activation. */
  previous: Claim | null;
};

export type JobStatus = "running" | "succeeded" | "failed" | "timed_out" | "interrupted";

export type JobRecord = {
  id: string;
  competitorId: string;
  status: JobStatus;
  startedAt: Date;
  finishedAt: Date | null;
  error: string | null;
  stats: Record<string, number>;
};

type ClaimRow = {
  id: string;
  competitor_id: string;
  claim_type: string;
  claim_subtype: string | null;
  claim_data: string;
  evidence_ids: string;
  evidence_quote: string | null;
  confidence_score: number;
  confidence_level: string;
  status: string;
  valid_from: string;
  valid_to: string | null;
  superseded_by: string | null;
  extraction_model: string | null;
  extraction_reasoning: string | null;
  raw_text: string | null;
  validated_by: string;
  validation_notes: string | null;
  created_at: string;
};

type EventRow = {
  id: string;
  competitor_id: string;
  previous_claim_id: string | null;
  new_claim_id: string;
  change_type: string;
  severity: string;
  summary: string;
  previous_value: string | null;
  new_value: string;
  detected_at: string;
};

type JobRow = {
  id: string;
  competitor_id: string;
  status: string;
  started_at: string;
  finished_at: string | null;
  error: string | null;
  stats: string;
};

const STATUSES: ClaimStatus[] = ["active", "superseded", "review_required", "rejected"];
const SEVERITIES: Severity[] = ["high", "medium", "low"];
const JOB_STATUSES: JobStatus[] = ["running", "succeeded", "failed", "timed_out", "interrupted"];

function pick<T extends string>(allowed: readonly T[], raw: string, fallback: T): T {
  return allowed.find((a) => a === raw) ?? fallback;
}

function parseObject(raw: string): ClaimPayload {
  const v: unknown = JSON.parse(raw);
  return v && typeof v === "object" && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : {};
}

function parseStrings(raw: string): string[] {
  const v: unknown = JSON.parse(raw);
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

function parseCounts(raw: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(parseObject(raw))) if (typeof v === "number") out[k] = v;
  return out;
}

function toClaim(r: ClaimRow): Claim {
  const score = r.confidence_score;
  return {
    id: r.id,
    competitorId: r.competitor_id,
    claimType: r.claim_type,
    claimSubtype: r.claim_subtype,
    claimData: parseObject(r.claim_data),
    evidenceIds: parseStrings(r.evidence_ids),
    evidenceQuote: r.evidence_quote,
    confidence: { score, level: levelFromScore(score) },
    status: pick(STATUSES, r.status, "review_required"),
    validFrom: new Date(r.valid_from),
    validTo: r.valid_to ? new Date(r.valid_to) : null,
    supersededBy: r.superseded_by,
    extractionModel: r.extraction_model,
    extractionReasoning: r.extraction_reasoning,
    rawText: r.raw_text,
    validatedBy: r.validated_by === "human" ? "human" : "auto",
    validationNotes: r.validation_notes,
    createdAt: new Date(r.created_at)
  };
}

function toEvent(r: EventRow): ChangeEvent {
  return {
    id: r.id,
    competitorId: r.competitor_id,
    previousClaimId: r.previous_claim_id,
    newClaimId: r.new_claim_id,
    changeType: r.change_type,
    severity: pick(SEVERITIES, r.severity, "low"),
    summary: r.summary,
    previousValue: r.previous_value === null ? null : parseObject(r.previous_value),
    newValue: parseObject(r.new_value),
    detectedAt: new Date(r.detected_at)
  };
}

function toJob(r: JobRow): JobRecord {
  return {
    id: r.id,
    competitorId: r.competitor_id,
    status: pick(JOB_STATUSES, r.status, "interrupted"),
    startedAt: new Date(r.started_at),
    finishedAt: r.finished_at ? new Date(r.finished_at) : null,
    error: r.error,
    stats: parseCounts(r.stats)
  };
}

export function payloadEquals(a: ClaimPayload, b: ClaimPayload): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

/**
 * Candidate content hash + target key. Re-processing the same evidence into the
 * same payload for the same key is recognised as already committed.
 */
export function idempotencyKey(input: Pick<CommitInput, "competitorId" | "claimType" | "claimSubtype" | "claimData" | "evidenceHashes">) {
  return createHash("sha256")
    .update(formatClaimKey(input))
    .update("\n")
    .update([...input.evidenceHashes].sort().join(","))
    .update("\n")
    .update(canonicalJson(input.claimData))
    .digest("hex");
}

export type ClaimLedgerOptions = {
  /** Scores below this are parked as review_required. */
  minScore?: number;
  now?: () => Date;
  logger?: Logger;
};

/**
 * Versioned claim store.
 *
 * INVARIANT: at most one active claim per (competitor, claim_type, claim_subtype),
 * enforced by a partial unique index as well as by commit().
 * INVARIANT: a supersession (insert successor + retire predecessor) is one transaction.
 * Claims are never deleted.
 */
export class ClaimLedger {
  private readonly db: Database.Database;
  private readonly minScore: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(dbPath: string, opts: ClaimLedgerOptions = {}) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("foreign_keys = ON");
    this.minScore = opts.minScore ?? 40;
    this.now = opts.now ?? (() => new Date());
    this.log = opts.logger ?? defaultLogger;
    this.createTables();
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS claims (
        id TEXT PRIMARY KEY,
        competitor_id TEXT NOT NULL,
        claim_type TEXT NOT NULL,
        claim_subtype TEXT,
        claim_data TEXT NOT NULL,
        evidence_ids TEXT NOT NULL DEFAULT '[]',
        evidence_quote TEXT,
        confidence_score INTEGER NOT NULL CHECK (confidence_score BETWEEN 0 AND 100),
        confidence_level TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('active', 'superseded', 'review_required', 'rejected')),
        valid_from TEXT NOT NULL,
        valid_to TEXT,
        superseded_by TEXT REFERENCES claims(id) DEFERRABLE INITIALLY DEFERRED,
        extraction_model TEXT,
        extraction_reasoning TEXT,
        raw_text TEXT,
        validated_by TEXT NOT NULL DEFAULT 'auto',
        validation_notes TEXT,
        created_at TEXT NOT NULL,
        CHECK (valid_to IS NULL OR valid_from <= valid_to)
      );

      CREATE UNIQUE INDEX IF NOT EXISTS ux_claims_one_active
        ON claims(competitor_id, claim_type, COALESCE(claim_subtype, ''))
        WHERE status = 'active';
      CREATE INDEX IF NOT EXISTS ix_claims_competitor ON claims(competitor_id);
      CREATE INDEX IF NOT EXISTS ix_claims_key ON claims(competitor_id, claim_type, claim_subtype);
      CREATE INDEX IF NOT EXISTS ix_claims_status ON claims(status);

      CREATE TABLE IF NOT EXISTS commit_log (
        idempotency_key TEXT PRIMARY KEY,
        claim_id TEXT,
        outcome TEXT NOT NULL,
        committed_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS change_events (
        id TEXT PRIMARY KEY,
        dedup_key TEXT NOT NULL UNIQUE,
        competitor_id TEXT NOT NULL,
        previous_claim_id TEXT REFERENCES claims(id),
        new_claim_id TEXT NOT NULL REFERENCES claims(id),
        change_type TEXT NOT NULL,
        severity TEXT NOT NULL CHECK (severity IN ('high', 'medium', 'low')),
        summary TEXT NOT NULL,
        previous_value TEXT,
        new_value TEXT NOT NULL,
        detected_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS ix_events_competitor ON change_events(competitor_id, detected_at);

      CREATE TABLE IF NOT EXISTS refresh_jobs (
        id TEXT PRIMARY KEY,
        competitor_id TEXT NOT NULL,
        status TEXT NOT NULL,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        error TEXT,
        stats TEXT NOT NULL DEFAULT '{}'
      );
    `);
  }

  close(): void {
    this.db.close();
  }

  // --------------------------------------------------------------------------
  // reads
  // --------------------------------------------------------------------------

  getActive(key: ClaimKey): Claim | null {
    const row = this.db
      .prepare(
        `SELECT * FROM claims
         WHERE competitor_id = ? AND claim_type = ? AND COALESCE(claim_subtype, '') = ? AND status = 'active'`
      )
      .get(key.competitorId, key.claimType, key.claimSubtype ?? "") as ClaimRow | undefined;
    return row ? toClaim(row) : null;
  }

  getClaim(id: string): Claim | null {
    const row = this.db.prepare(`SELECT * FROM claims WHERE id = ?`).get(id) as ClaimRow | undefined;
    return row ? toClaim(row) : null;
  }

  listClaims(competitorId: string, status?: ClaimStatus): Claim[] {
    const rows = (
      status
        ? this.db
            .prepare(`SELECT * FROM claims WHERE competitor_id = ? AND status = ? ORDER BY created_at, rowid`)
            .all(competitorId, status)
        : this.db.prepare(`SELECT * FROM claims WHERE competitor_id = ? ORDER BY created_at, rowid`).all(competitorId)
    ) as ClaimRow[];
    return rows.map(toClaim);
  }

  /** Every version for a key, oldest first. */
  history(key: ClaimKey): Claim[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM claims
         WHERE competitor_id = ? AND claim_type = ? AND COALESCE(claim_subtype, '') = ?
         ORDER BY created_at, rowid`
      )
      .all(key.competitorId, key.claimType, key.claimSubtype ?? "") as ClaimRow[];
    return rows.map(toClaim);
  }

  /** The claim whose superseded_by points at this one. */
  predecessorOf(id: string): Claim | null {
    const row = this.db
      .prepare(`SELECT * FROM claims WHERE superseded_by = ? ORDER BY valid_to DESC, rowid DESC LIMIT 1`)
      .get(id) as ClaimRow | undefined;
    return row ? toClaim(row) : null;
  }

  /**
   * Follow superseded_by from a claim. The last element is the active claim,
   * or a claim with no successor.
   */
  followChain(id: string): Claim[] {
    const chain: Claim[] = [];
    const seen = new Set<string>();
    let cur = this.getClaim(id);
    while (cur) {
      if (seen.has(cur.id)) throw new Error(`Supersession cycle at claim ${cur.id}`);
      seen.add(cur.id);
      chain.push(cur);
      cur = cur.supersededBy ? this.getClaim(cur.supersededBy) : null;
    }
    return chain;
  }

  // --------------------------------------------------------------------------
  // writes
  // --------------------------------------------------------------------------

  /**
   * Apply one triangulated result to the ledger, all-or-nothing.
   *
   * Throws ConcurrentSupersessionConflictError when the active claim is no
   * longer the one the caller read (another writer committed first).
   */
  commit(input: CommitInput): CommitResult {
    if (!Number.isInteger(input.score) || input.score < 0 || input.score > 100) {
      throw new ValidationError(`Confidence score must be an integer in [0, 100], got ${input.score}`);
    }

    const key = formatClaimKey(input);
    const ikey = idempotencyKey(input);

    const run = this.db.transaction((): CommitResult => {
      const logged = this.db.prepare(`SELECT claim_id FROM commit_log WHERE idempotency_key = ?`).get(ikey) as
        | { claim_id: string | null }
        | undefined;
      // A superseded logged claim is not a repeat; X -> Y -> X moves back to X.
      const loggedClaim = logged?.claim_id ? this.getClaim(logged.claim_id) : null;
      if (logged && loggedClaim?.status !== "superseded") {
        return { outcome: "duplicate", claim: loggedClaim, previous: null };
      }

      const current = this.getActive(input);
      const currentId = current?.id ?? null;
      if (currentId !== input.expectedActiveId) {
        throw new ConcurrentSupersessionConflictError(key, input.expectedActiveId, currentId);
      }

      const now = this.now();
      let result: CommitResult;

      if (input.forceReview) {
        result = { outcome: "review_required", claim: this.insert(input, "review_required", now), previous: null };
      } else if (current && payloadEquals(current.claimData, input.claimData)) {
        result = { outcome: "unchanged", claim: current, previous: null };
      } else if (input.score < this.minScore) {
        result = { outcome: "review_required", claim: this.insert(input, "review_required", now), previous: null };
      } else if (!current) {
        result = { outcome: "created", claim: this.insert(input, "active", now), previous: null };
      } else {
        const id = createId();
        this.retire(current, id, now);
        const claim = this.insert(input, "active", now, id);
        result = { outcome: "superseded", claim, previous: this.getClaim(current.id) };
      }

      this.db
        .prepare(
          `INSERT INTO commit_log (idempotency_key, claim_id, outcome, committed_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(idempotency_key) DO UPDATE SET
             claim_id = excluded.claim_id, outcome = excluded.outcome, committed_at = excluded.committed_at`
        )
        .run(ikey, result.claim?.id ?? null, result.outcome, now.toISOString());
      return result;
    });

    const result = run.immediate();
    this.log.info("Claim commit", {
      key,
      outcome: result.outcome,
      claimId: result.claim?.id ?? null,
      previousId: result.previous?.id ?? null,
      score: input.score
    });
    return result;
  }

  reject(id: string, notes: string | null = null): Claim {
    const run = this.db.transaction((): Claim => {
      const claim = this.getClaim(id);
      if (!claim) throw new ClaimNotFoundError(id);
      const now = this.now();
      const validTo =
        claim.status === "active" ? this.notBefore(now, claim.validFrom).toISOString() : (claim.validTo?.toISOString() ?? null);
      this.db
        .prepare(
          `UPDATE claims SET status = 'rejected', valid_to = ?, validated_by = 'human', validation_notes = ? WHERE id = ?`
        )
        .run(validTo, notes, id);
      return this.mustGet(id);
    });
    const claim = run.immediate();
    this.log.info("Claim rejected by override", { claimId: id, key: formatClaimKey(claim) });
    return claim;
  }

  /**
   * Make a claim the active version for its key regardless of score. The
   * displaced active claim is superseded by it in the same transaction.
   */
  forceActivate(id: string, notes: string | null = null): OverrideResult {
    const run = this.db.transaction((): OverrideResult => {
      const claim = this.getClaim(id);
      if (!claim) throw new ClaimNotFoundError(id);
      if (claim.status === "active") {
        this.db.prepare(`UPDATE claims SET validated_by = 'human', validation_notes = ? WHERE id = ?`).run(notes, id);
        return { claim: this.mustGet(id), previous: null };
      }

      const now = this.now();
      const current = this.getActive(claim);
      if (current) this.retire(current, id, now);

      this.db
        .prepare(
          `UPDATE claims
           SET status = 'active', valid_from = ?, valid_to = NULL, superseded_by = NULL,
               validated_by = 'human', validation_notes = ?
           WHERE id = ?`
        )
        .run(now.toISOString(), notes, id);

      return { claim: this.mustGet(id), previous: current ? this.mustGet(current.id) : null };
    });
    const result = run.immediate();
    this.log.info("Claim activated by override", {
      claimId: id,
      key: formatClaimKey(result.claim),
      previousId: result.previous?.id ?? null
    });
    return result;
  }

  // --------------------------------------------------------------------------
  // change events
  // --------------------------------------------------------------------------

  /** Insert unless an event with the same dedup key exists. Returns whether it was inserted. */
  recordChangeEvent(event: ChangeEvent, dedupKey: string): boolean {
    const info = this.db
      .prepare(
        `INSERT OR IGNORE INTO change_events
          (id, dedup_key, competitor_id, previous_claim_id, new_claim_id, change_type, severity, summary,
           previous_value, new_value, detected_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        event.id,
        dedupKey,
        event.competitorId,
        event.previousClaimId,
        event.newClaimId,
        event.changeType,
        event.severity,
        event.summary,
        event.previousValue === null ? null : JSON.stringify(event.previousValue),
        JSON.stringify(event.newValue),
        event.detectedAt.toISOString()
      );
    return info.changes > 0;
  }

  hasChangeEvent(dedupKey: string): boolean {
    return this.db.prepare(`SELECT 1 FROM change_events WHERE dedup_key = ?`).get(dedupKey) !== undefined;
  }

  listChangeEvents(competitorId: string): ChangeEvent[] {
    const rows = this.db
      .prepare(`SELECT * FROM change_events WHERE competitor_id = ? ORDER BY detected_at, rowid`)
      .all(competitorId) as EventRow[];
    return rows.map(toEvent);
  }

  // --------------------------------------------------------------------------
  // refresh job state
  // --------------------------------------------------------------------------

  startJob(competitorId: string): string {
    const id = createId();
    this.db
      .prepare(`INSERT INTO refresh_jobs (id, competitor_id, status, started_at) VALUES (?, ?, 'running', ?)`)
      .run(id, competitorId, this.now().toISOString());
    return id;
  }

  finishJob(id: string, status: Exclude<JobStatus, "running">, stats: Record<string, number>, error: string | null = null) {
    this.db
      .prepare(`UPDATE refresh_jobs SET status = ?, finished_at = ?, error = ?, stats = ? WHERE id = ?`)
      .run(status, this.now().toISOString(), error, JSON.stringify(stats), id);
  }

  getJob(id: string): JobRecord | null {
    const row = this.db.prepare(`SELECT * FROM refresh_jobs WHERE id = ?`).get(id) as JobRow | undefined;
    return row ? toJob(row) : null;
  }

  /**
   * Jobs still marked running belong to a process that died. Commits are
   * idempotent, so they are only marked for re-run.
   */
  recoverInterruptedJobs(): string[] {
    const rows = this.db.prepare(`SELECT competitor_id FROM refresh_jobs WHERE status = 'running'`).all() as Array<{
      competitor_id: string;
    }>;
    if (rows.length === 0) return [];
    this.db
      .prepare(`UPDATE refresh_jobs SET status = 'interrupted', finished_at = ? WHERE status = 'running'`)
      .run(this.now().toISOString());
    const competitors = [...new Set(rows.map((r) => r.competitor_id))];
    this.log.warn("Recovered interrupted refresh jobs", { competitors });
    return competitors;
  }

  // --------------------------------------------------------------------------

  private insert(input: CommitInput, status: ClaimStatus, now: Date, id: string = createId()): Claim {
    this.db
      .prepare(
        `INSERT INTO claims
          (id, competitor_id, claim_type, claim_subtype, claim_data, evidence_ids, evidence_quote,
           confidence_score, confidence_level, status, valid_from, extraction_model, extraction_reasoning,
           raw_text, validated_by, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'auto', ?)`
      )
      .run(
        id,
        input.competitorId,
        input.claimType,
        input.claimSubtype,
        JSON.stringify(input.claimData),
        JSON.stringify(input.evidenceIds),
        input.evidenceQuote,
        input.score,
        levelFromScore(input.score),
        status,
        now.toISOString(),
        input.extractionModel ?? null,
        input.extractionReasoning ?? null,
        input.rawText ?? null,
        now.toISOString()
      );
    return this.mustGet(id);
  }

  private retire(current: Claim, successorId: string, now: Date): void {
    this.db
      .prepare(`UPDATE claims SET status = 'superseded', valid_to = ?, superseded_by = ? WHERE id = ?`)
      .run(this.notBefore(now, current.validFrom).toISOString(), successorId, current.id);
  }

  private notBefore(now: Date, validFrom: Date): Date {
    return now.getTime() < validFrom.getTime() ? validFrom : now;
  }

  private mustGet(id: string): Claim {
    const claim = this.getClaim(id);
    if (!claim) throw new ClaimNotFoundError(id);
    return claim;
  }
}
