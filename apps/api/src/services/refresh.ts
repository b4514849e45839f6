import { hasAnyValue, type Candidate, type ExtractionAgent } from "../agents/extractor";
import { getClaimSchema } from "../agents/schemas";
import type { AIRouter, ProviderUsage } from "../llm/router";
import type { ChangeEvent, ClaimKey, Evidence } from "../types/claims";
import type { JobCounts, JobOutcome, JobResult, TraceEvent } from "../types/job";
import { toAlertPayload, type AlertDispatcher } from "./alerts";
import type { ChangeDetector } from "./changeDetector";
import type { ClaimTarget, CompetitorConfig } from "./competitors";
import { calculateDataStaleness, canonicalJson, credibilityFromExtraction, triangulateDataPoints } from "./confidence";
import { ClaimwatchError, ConcurrentSupersessionConflictError, JobTimeoutError, RefreshInProgressError } from "./errors";
import type { EvidenceSource } from "./evidence";
import type { ClaimLedger, CommitInput, CommitResult } from "./ledger";
import { errorMessage, logger as defaultLogger, type Logger } from "./logger";

export type RefreshSchedulerOptions = {
  ledger: ClaimLedger;
  extractor: ExtractionAgent;
  evidence: EvidenceSource;
  detector: ChangeDetector;
  alerts: AlertDispatcher;
  /** Circuit breakers and usage totals are reset per run when given. */
  router?: AIRouter;
  concurrency?: number;
  staggerMs?: number;
  timeoutMs?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export type RefreshRunResult = {
  jobs: JobResult[];
  succeeded: number;
  failed: number;
  timedOut: number;
  usage: Record<string, ProviderUsage>;
};

type JobState = {
  counts: JobCounts;
  events: ChangeEvent[];
  trace: TraceEvent[];
};

type Extracted = { evidence: Evidence; candidate: Candidate };

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function emptyCounts(): JobCounts {
  return {
    created: 0,
    superseded: 0,
    unchanged: 0,
    review_required: 0,
    duplicate: 0,
    conflicts_skipped: 0,
    no_value: 0,
    events: 0
  };
}

/**
 * Runs one refresh job per competitor through a fixed-size worker pool.
 *
 * Each job: evidence -> extraction per claim type -> triangulation -> ledger
 * commit -> change detection -> alert. Job starts are staggered. A job that
 * fails or times out is reported and never stops the others.
 *
 * INVARIANT: a job checks its abort signal before every commit, so nothing is
 * committed after its timeout fires.
 */
export class RefreshScheduler {
  private readonly ledger: ClaimLedger;
  private readonly extractor: ExtractionAgent;
  private readonly evidence: EvidenceSource;
  private readonly detector: ChangeDetector;
  private readonly alerts: AlertDispatcher;
  private readonly router: AIRouter | null;
  private readonly concurrency: number;
  private readonly staggerMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  private running = false;

  constructor(opts: RefreshSchedulerOptions) {
    this.ledger = opts.ledger;
    this.extractor = opts.extractor;
    this.evidence = opts.evidence;
    this.detector = opts.detector;
    this.alerts = opts.alerts;
    this.router = opts.router ?? null;
    this.concurrency = Math.max(1, opts.concurrency ?? 3);
    this.staggerMs = Math.max(0, opts.staggerMs ?? 500);
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? 120_000);
    this.now = opts.now ?? (() => new Date());
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = opts.logger ?? defaultLogger;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Throws RefreshInProgressError when a run is already going. */
  async runAll(competitors: CompetitorConfig[]): Promise<RefreshRunResult> {
    if (this.running) throw new RefreshInProgressError();
    this.running = true;
    this.router?.beginRun();
    const started = Date.now();
    const jobs: JobResult[] = [];
    let next = 0;

    const worker = async () => {
      while (next < competitors.length) {
        const i = next++;
        const wait = started + i * this.staggerMs - Date.now();
        if (i > 0 && wait > 0) await this.sleep(wait);
        jobs[i] = await this.runJob(competitors[i]);
      }
    };

    try {
      await Promise.all(Array.from({ length: Math.min(this.concurrency, competitors.length) }, () => worker()));
    } finally {
      this.running = false;
    }

    const result: RefreshRunResult = {
      jobs,
      succeeded: jobs.filter((j) => j.status === "succeeded").length,
      failed: jobs.filter((j) => j.status === "failed").length,
      timedOut: jobs.filter((j) => j.status === "timed_out").length,
      usage: this.router?.getUsage() ?? {}
    };
    this.log.info("Refresh run finished", {
      jobs: jobs.length,
      succeeded: result.succeeded,
      failed: result.failed,
      timedOut: result.timedOut,
      ms: Date.now() - started
    });
    return result;
  }

  /**
   * Re-run competitors whose previous job never finished. Commits are
   * idempotent, so repeating their work does not double-commit.
   */
  async resumeInterrupted(competitors: CompetitorConfig[]): Promise<RefreshRunResult | null> {
    const ids = new Set(this.ledger.recoverInterruptedJobs());
    const pending = competitors.filter((c) => ids.has(c.id));
    if (pending.length === 0) return null;
    return this.runAll(pending);
  }

  /** Never throws; failures are reported in the result. */
  async runJob(competitor: CompetitorConfig): Promise<JobResult> {
    const jobId = this.ledger.startJob(competitor.id);
    const state: JobState = { counts: emptyCounts(), events: [], trace: [] };
    const started = Date.now();

    let status: JobOutcome = "succeeded";
    let error: string | null = null;
    let errorCode: string | null = null;

    try {
      await this.withTimeout(competitor.id, (signal) => this.process(competitor, state, signal));
    } catch (err) {
      status = err instanceof JobTimeoutError ? "timed_out" : "failed";
      error = errorMessage(err);
      errorCode = err instanceof ClaimwatchError ? err.code : "internal";
      this.log.error("Refresh job failed", { competitorId: competitor.id, jobId, status, error });
    }

    const durationMs = Date.now() - started;
    state.trace.push({ type: "timing", ms: durationMs });
    this.ledger.finishJob(jobId, status, { ...state.counts }, error);

    return {
      jobId,
      competitorId: competitor.id,
      status,
      counts: state.counts,
      events: state.events,
      error,
      errorCode,
      trace: state.trace,
      durationMs
    };
  }

  private async withTimeout(competitorId: string, work: (signal: AbortSignal) => Promise<void>): Promise<void> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new JobTimeoutError(competitorId, this.timeoutMs);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });

    try {
      await Promise.race([work(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private ensureNotAborted(signal: AbortSignal, competitorId: string): void {
    if (!signal.aborted) return;
    throw signal.reason instanceof JobTimeoutError ? signal.reason : new JobTimeoutError(competitorId, this.timeoutMs);
  }

  private async process(competitor: CompetitorConfig, state: JobState, signal: AbortSignal): Promise<void> {
    const evidence = await this.evidence.load(competitor, signal);
    this.ensureNotAborted(signal, competitor.id);
    state.trace.push({ type: "evidence", count: evidence.length });

    if (evidence.length === 0) {
      this.log.warn("No evidence for competitor", { competitorId: competitor.id });
      return;
    }

    for (const target of competitor.claimTypes) {
      await this.refreshClaim(competitor, target, evidence, state, signal);
    }
  }

  private async refreshClaim(
    competitor: CompetitorConfig,
    target: ClaimTarget,
    evidence: Evidence[],
    state: JobState,
    signal: AbortSignal
  ): Promise<void> {
    const schema = getClaimSchema(target.type);
    if (!schema) {
      this.log.warn("No extraction schema for claim type", { competitorId: competitor.id, claimType: target.type });
      return;
    }

    const key: ClaimKey = { competitorId: competitor.id, claimType: target.type, claimSubtype: target.subtype };
    const expectedActiveId = this.ledger.getActive(key)?.id ?? null;

    const extracted: Extracted[] = [];
    for (const ev of evidence) {
      this.ensureNotAborted(signal, competitor.id);
      const candidate = await this.extractor.extract(ev.contentText, schema, {
        competitorName: competitor.name,
        claimSubtype: target.subtype,
        sourceType: ev.sourceType,
        sourceUrl: ev.sourceUrl
      });
      state.trace.push({
        type: "extract",
        claimType: target.type,
        evidenceId: ev.id,
        status: candidate.status,
        model: candidate.model,
        attempts: candidate.attempts
      });
      extracted.push({ evidence: ev, candidate });
    }

    // Unparseable replies are kept for a human; they never touch the active claim.
    for (const { evidence: ev, candidate } of extracted.filter((x) => x.candidate.status === "review_required")) {
      const result = this.commitWithRetry(
        key,
        (expected) => ({
          ...key,
          claimData: candidate.fields,
          evidenceIds: [ev.id],
          evidenceHashes: [ev.contentHash],
          evidenceQuote: null,
          score: 0,
          expectedActiveId: expected,
          extractionModel: candidate.model,
          extractionReasoning: candidate.parseError,
          rawText: candidate.rawText,
          forceReview: true
        }),
        expectedActiveId,
        state,
        signal
      );
      if (result) this.count(state, result);
    }

    const usable = extracted.filter((x) => x.candidate.status === "extracted" && hasAnyValue(x.candidate.fields));
    if (usable.length === 0) {
      state.counts.no_value += 1;
      return;
    }

    const now = this.now();
    const tri = triangulateDataPoints(
      usable.map(({ evidence: ev, candidate }) => ({
        value: candidate.fields,
        sourceType: ev.sourceType,
        credibility: credibilityFromExtraction(ev.sourceType, candidate.rawConfidence),
        dataAgeDays: calculateDataStaleness(ev.fetchedAt, now)
      }))
    );
    state.trace.push({
      type: "triangulate",
      claimType: target.type,
      sourceUsed: tri.sourceUsed,
      score: tri.score,
      discrepancy: tri.discrepancyFlag
    });

    const best = tri.bestValue;
    const winner = usable[tri.winnerIndex];
    if (best === null || !winner) {
      state.counts.no_value += 1;
      return;
    }

    const bestKey = canonicalJson(best);
    const supporting = usable.filter((x) => canonicalJson(x.candidate.fields) === bestKey);

    const result = this.commitWithRetry(
      key,
      (expected) => ({
        ...key,
        claimData: best,
        evidenceIds: supporting.map((x) => x.evidence.id),
        evidenceHashes: supporting.map((x) => x.evidence.contentHash),
        evidenceQuote: winner.candidate.evidenceQuote,
        score: tri.score,
        expectedActiveId: expected,
        extractionModel: winner.candidate.model,
        extractionReasoning: winner.candidate.reasoning
      }),
      expectedActiveId,
      state,
      signal
    );
    if (!result) return;
    this.count(state, result);
    await this.emitChange(result, state);
  }

  /**
   * Commit against the active claim read at the start of the pass. On a
   * conflict, retry once against the now-current active claim; a second
   * conflict is a skipped update.
   */
  private commitWithRetry(
    key: ClaimKey,
    build: (expectedActiveId: string | null) => CommitInput,
    expectedActiveId: string | null,
    state: JobState,
    signal: AbortSignal
  ): CommitResult | null {
    let expected = expectedActiveId;
    for (let attempt = 1; ; attempt++) {
      this.ensureNotAborted(signal, key.competitorId);
      try {
        return this.ledger.commit(build(expected));
      } catch (err) {
        if (!(err instanceof ConcurrentSupersessionConflictError)) throw err;
        const retrying = attempt < 2;
        state.trace.push({
          type: "conflict",
          claimType: key.claimType,
          expected: err.expectedActiveId,
          actual: err.actualActiveId,
          retrying
        });
        if (!retrying) {
          state.counts.conflicts_skipped += 1;
          this.log.warn("Claim update skipped after repeated conflict", {
            competitorId: key.competitorId,
            claimType: key.claimType
          });
          return null;
        }
        expected = err.actualActiveId;
      }
    }
  }

  private count(state: JobState, result: CommitResult): void {
    state.counts[result.outcome] += 1;
    state.trace.push({
      type: "commit",
      claimType: result.claim?.claimType ?? "unknown",
      outcome: result.outcome,
      claimId: result.claim?.id ?? null
    });
  }

  private async emitChange(result: CommitResult, state: JobState): Promise<void> {
    let event: ChangeEvent | null = null;
    if (result.outcome === "created" || result.outcome === "superseded") {
      if (result.claim) event = this.detector.detect(result.previous, result.claim);
    } else if (result.outcome === "duplicate" && result.claim?.status === "active") {
      // A rerun after a crash between commit and detection; the detector dedups.
      event = this.detector.detect(this.ledger.predecessorOf(result.claim.id), result.claim);
    }
    if (!event) return;

    state.events.push(event);
    state.counts.events += 1;
    try {
      await this.alerts.dispatch(toAlertPayload(event));
    } catch (err) {
      this.log.error("Alert dispatch failed", { eventId: event.id, changeType: event.changeType, error: errorMessage(err) });
    }
  }
}
