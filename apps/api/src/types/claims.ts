export const SOURCE_TYPES = [
  "filing",
  "api_verified",
  "analyst_report",
  "manual_verified",
  "website",
  "news",
  "estimate",
  "database",
  "unknown"
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export type ConfidenceLevel = "high" | "moderate" | "low";

export type ClaimStatus = "active" | "superseded" | "review_required" | "rejected";

export type Severity = "high" | "medium" | "low";

export type ClaimPayload = Record<string, unknown>;

/**
 * Raw content owned by the ingestion side. Read-only here.
 */
export type Evidence = {
  id: string;
  competitorId: string;
  sourceType: SourceType;
  sourceUrl: string | null;
  contentHash: string;
  contentText: string;
  fetchedAt: Date;
};

/**
 * (competitor, claim_type, claim_subtype); at most one active claim per key.
 */
export type ClaimKey = {
  competitorId: string;
  claimType: string;
  claimSubtype: string | null;
};

export type Claim = ClaimKey & {
  id: string;
  claimData: ClaimPayload;
  evidenceIds: string[];
  evidenceQuote: string | null;
  confidence: { score: number; level: ConfidenceLevel };
  status: ClaimStatus;
  validFrom: Date;
  validTo: Date | null;
  supersededBy: string | null;
  extractionModel: string | null;
  extractionReasoning: string | null;
  rawText: string | null;
  validatedBy: "auto" | "human";
  validationNotes: string | null;
  createdAt: Date;
};

export type ChangeEvent = {
  id: string;
  competitorId: string;
  previousClaimId: string | null;
  newClaimId: string;
  changeType: string;
  severity: Severity;
  summary: string;
  previousValue: ClaimPayload | null;
  newValue: ClaimPayload;
  detectedAt: Date;
};

/**
 * What the alerting collaborator receives.
 */
export type AlertPayload = {
  competitor_id: string;
  change_type: string;
  severity: Severity;
  previous_value: ClaimPayload | null;
  new_value: ClaimPayload;
  detected_at: string;
};

export function claimKeyOf(k: ClaimKey): ClaimKey {
  return { competitorId: k.competitorId, claimType: k.claimType, claimSubtype: k.claimSubtype };
}

export function formatClaimKey(k: ClaimKey): string {
  return `${k.competitorId}/${k.claimType}/${k.claimSubtype ?? "-"}`;
}

export function levelFromScore(score: number): ConfidenceLevel {
  if (score >= 70) return "high";
  if (score >= 40) return "moderate";
  return "low";
}
