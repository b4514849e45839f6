import type { ChangeEvent } from "./claims";

export type TraceEvent =
  | { type: "evidence"; count: number }
  | { type: "extract"; claimType: string; evidenceId: string; status: "extracted" | "review_required"; model: string; attempts: number }
  | { type: "triangulate"; claimType: string; sourceUsed: string; score: number; discrepancy: boolean }
  | { type: "commit"; claimType: string; outcome: string; claimId: string | null }
  | { type: "conflict"; claimType: string; expected: string | null; actual: string | null; retrying: boolean }
  | { type: "timing"; ms: number };

export type JobOutcome = "succeeded" | "failed" | "timed_out";

export type JobCounts = {
  created: number;
  superseded: number;
  unchanged: number;
  review_required: number;
  duplicate: number;
  conflicts_skipped: number;
  no_value: number;
  events: number;
};

export type JobResult = {
  jobId: string;
  competitorId: string;
  status: JobOutcome;
  counts: JobCounts;
  events: ChangeEvent[];
  error: string | null;
  errorCode: string | null;
  trace: TraceEvent[];
  durationMs: number;
};
