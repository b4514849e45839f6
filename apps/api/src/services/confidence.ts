import { z } from "zod";
import { levelFromScore, SOURCE_TYPES, type ConfidenceLevel, type SourceType } from "../types/claims";
import { ValidationError } from "./errors";

/**
 * Admiralty Code scoring: source reliability (A-F) and information
 * credibility (1-6), adjusted for corroboration, source type and age.
 */

export type Reliability = "A" | "B" | "C" | "D" | "E" | "F";
export type Credibility = 1 | 2 | 3 | 4 | 5 | 6;

type SourceDefaults = { reliability: Reliability; credibility: Credibility; bonus: number; description: string };

export const SOURCE_TYPE_DEFAULTS: Record<SourceType, SourceDefaults> = {
  filing: { reliability: "A", credibility: 1, bonus: 10, description: "Legally mandated filing" },
  api_verified: { reliability: "B", credibility: 2, bonus: 8, description: "Official API data" },
  analyst_report: { reliability: "B", credibility: 2, bonus: 8, description: "Industry analyst research or market-data feed" },
  manual_verified: { reliability: "B", credibility: 2, bonus: 5, description: "Human-verified entry" },
  website: { reliability: "D", credibility: 4, bonus: 0, description: "Marketing website content" },
  news: { reliability: "C", credibility: 3, bonus: -2, description: "Press releases, news" },
  estimate: { reliability: "D", credibility: 4, bonus: 0, description: "Proxy estimate (e.g. headcount from a social profile)" },
  database: { reliability: "D", credibility: 4, bonus: 0, description: "Third-party company database" },
  unknown: { reliability: "F", credibility: 6, bonus: -10, description: "Source not documented" }
};

const SOURCE_ALIASES: Record<string, SourceType> = {
  sec_filing: "filing",
  website_scrape: "website",
  news_article: "news",
  klas_report: "analyst_report",
  definitive_hc: "analyst_report",
  linkedin_estimate: "estimate",
  crunchbase: "database"
};

export const AUTHORITY_ORDER: SourceType[] = ["filing", "api_verified", "analyst_report", "manual_verified"];

export const RELIABILITY_SCORES: Record<Reliability, number> = { A: 50, B: 40, C: 30, D: 20, E: 10, F: 5 };

export const CREDIBILITY_SCORES: Record<Credibility, number> = { 1: 30, 2: 25, 3: 20, 4: 15, 5: 10, 6: 5 };

export const RELIABILITY_DESCRIPTIONS: Record<Reliability, string> = {
  A: "Completely reliable",
  B: "Usually reliable",
  C: "Fairly reliable",
  D: "Not usually reliable",
  E: "Unreliable",
  F: "Reliability cannot be judged"
};

export const CREDIBILITY_DESCRIPTIONS: Record<Credibility, string> = {
  1: "Confirmed by other sources",
  2: "Probably true",
  3: "Possibly true",
  4: "Doubtfully true",
  5: "Improbable",
  6: "Truth cannot be judged"
};

const LEVEL_EXPLANATIONS: Record<ConfidenceLevel, string> = {
  high: "High confidence based on reliable, corroborated information from trusted sources",
  moderate: "Moderate confidence; credible information with limited corroboration or source reliability",
  low: "Low confidence; unverified claims or sources with limited reliability history"
};

const CREDIBILITIES: Credibility[] = [1, 2, 3, 4, 5, 6];

function isSourceType(key: string): key is SourceType {
  return (SOURCE_TYPES as readonly string[]).includes(key);
}

export function normalizeSourceType(raw: string | null | undefined): SourceType {
  const key = (raw ?? "").trim().toLowerCase();
  if (isSourceType(key)) return key;
  return SOURCE_ALIASES[key] ?? "unknown";
}

export function getSourceDefaults(sourceType: string): SourceDefaults {
  return SOURCE_TYPE_DEFAULTS[normalizeSourceType(sourceType)];
}

export function describeSourceType(sourceType: string): string {
  return getSourceDefaults(sourceType).description;
}

const ConfidenceInputSchema = z.object({
  sourceType: z.string(),
  reliability: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(["A", "B", "C", "D", "E", "F"]))
    .optional(),
  credibility: z
    .number()
    .int()
    .min(1)
    .max(6)
    .transform((n) => CREDIBILITIES[n - 1])
    .optional(),
  corroboratingSources: z.number().int().nonnegative().default(0),
  dataAgeDays: z.number().int().nonnegative().default(0)
});

export type ConfidenceInput = z.input<typeof ConfidenceInputSchema>;

export type ConfidenceBreakdown = {
  reliabilityScore: number;
  credibilityScore: number;
  corroborationBonus: number;
  sourceBonus: number;
  freshnessPenalty: number;
  rawScore: number;
  finalScore: number;
};

export type ConfidenceResult = {
  reliability: Reliability;
  credibility: Credibility;
  score: number;
  level: ConfidenceLevel;
  explanation: string;
  breakdown: ConfidenceBreakdown;
};

export function calculateConfidenceScore(input: ConfidenceInput): ConfidenceResult {
  const parsed = ConfidenceInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid confidence input: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  const p = parsed.data;

  const sourceType = normalizeSourceType(p.sourceType);
  const defaults = SOURCE_TYPE_DEFAULTS[sourceType];

  const reliability = p.reliability ?? defaults.reliability;
  const credibility = p.credibility ?? defaults.credibility;
  const reliabilityScore = RELIABILITY_SCORES[reliability];
  const credibilityScore = CREDIBILITY_SCORES[credibility];
  const corroborationBonus = Math.min(p.corroboratingSources * 5, 15);
  const freshnessPenalty = Math.min(Math.floor(p.dataAgeDays / 30), 15);
  const sourceBonus = defaults.bonus;

  const rawScore = reliabilityScore + credibilityScore + corroborationBonus + sourceBonus - freshnessPenalty;
  const finalScore = Math.max(0, Math.min(100, rawScore));
  const level = levelFromScore(finalScore);

  return {
    reliability,
    credibility,
    score: finalScore,
    level,
    explanation: LEVEL_EXPLANATIONS[level],
    breakdown: {
      reliabilityScore,
      credibilityScore,
      corroborationBonus,
      sourceBonus,
      freshnessPenalty,
      rawScore,
      finalScore
    }
  };
}

export function calculateDataStaleness(fetchedAt: Date, now: Date = new Date()): number {
  return Math.max(0, Math.floor((now.getTime() - fetchedAt.getTime()) / 86_400_000));
}

/**
 * Lower extraction confidence makes the information less credible: >= 0.8
 * keeps the source default, 0.7-0.8 costs one step, below 0.7 two.
 */
export function credibilityFromExtraction(sourceType: string, rawConfidence: number): Credibility {
  const base = getSourceDefaults(sourceType).credibility;
  const steps = rawConfidence >= 0.8 ? 0 : rawConfidence >= 0.7 ? 1 : 2;
  return CREDIBILITIES[Math.min(5, base - 1 + steps)];
}

export type DataPoint<T> = {
  value: T | null | undefined;
  sourceType: string;
  reliability?: string;
  credibility?: number;
  dataAgeDays?: number;
};

export type TriangulationResult<T> = {
  bestValue: T | null;
  score: number;
  level: ConfidenceLevel;
  sourceUsed: SourceType | "none";
  /** Index into the input list of the winning data point; -1 when none won. */
  winnerIndex: number;
  sourcesChecked: number;
  sourcesAgreeing: number;
  discrepancyFlag: boolean;
  reviewReason: string | null;
  breakdown: ConfidenceBreakdown | null;
};

export function isEmptyValue(v: unknown): boolean {
  if (v === null || v === undefined) return true;
  if (typeof v === "string") return v.trim() === "" || v.trim().toLowerCase() === "unknown";
  if (Array.isArray(v)) return v.length === 0;
  if (typeof v === "object") return Object.values(v).every(isEmptyValue);
  return false;
}

export function canonicalJson(v: unknown): string {
  if (Array.isArray(v)) return `[${v.map(canonicalJson).join(",")}]`;
  if (v && typeof v === "object") {
    const entries = Object.entries(v)
      .filter(([, x]) => x !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, x]) => `${JSON.stringify(k)}:${canonicalJson(x)}`).join(",")}}`;
  }
  return JSON.stringify(v ?? null);
}

function noWinner<T>(points: DataPoint<T>[], reason: string): TriangulationResult<T> {
  return {
    bestValue: null,
    score: 0,
    level: "low",
    sourceUsed: "none",
    winnerIndex: -1,
    sourcesChecked: points.length,
    sourcesAgreeing: 0,
    discrepancyFlag: true,
    reviewReason: reason,
    breakdown: null
  };
}

/**
 * Reconcile same-fact values from several sources into one trusted value.
 *
 * 1. First value from the highest-authority source wins, corroborated by all other sources.
 * 2. Otherwise the first non-empty value wins, uncorroborated and flagged for review.
 */
export function triangulateDataPoints<T>(points: DataPoint<T>[]): TriangulationResult<T> {
  if (points.length === 0) return noWinner(points, "No sources available");

  const agreeing = (value: T) => {
    const key = canonicalJson(value);
    return points.filter((p) => !isEmptyValue(p.value) && canonicalJson(p.value) === key).length;
  };

  for (const authority of AUTHORITY_ORDER) {
    const idx = points.findIndex((p) => normalizeSourceType(p.sourceType) === authority && !isEmptyValue(p.value));
    if (idx === -1) continue;

    const winner = points[idx];
    const value = winner.value;
    if (value === null || value === undefined) continue;
    const c = calculateConfidenceScore({
      sourceType: authority,
      reliability: winner.reliability,
      credibility: winner.credibility,
      corroboratingSources: points.length - 1,
      dataAgeDays: winner.dataAgeDays ?? 0
    });

    return {
      bestValue: value,
      score: c.score,
      level: c.level,
      sourceUsed: authority,
      winnerIndex: idx,
      sourcesChecked: points.length,
      sourcesAgreeing: agreeing(value),
      discrepancyFlag: false,
      reviewReason: null,
      breakdown: c.breakdown
    };
  }

  const idx = points.findIndex((p) => !isEmptyValue(p.value));
  if (idx === -1) return noWinner(points, "No values available from any source");

  const winner = points[idx];
  const value = winner.value;
  if (value === null || value === undefined) return noWinner(points, "No values available from any source");
  const sourceType = normalizeSourceType(winner.sourceType);
  const c = calculateConfidenceScore({
    sourceType,
    reliability: winner.reliability,
    credibility: winner.credibility,
    corroboratingSources: 0,
    dataAgeDays: winner.dataAgeDays ?? 0
  });

  return {
    bestValue: value,
    score: c.score,
    level: c.level,
    sourceUsed: sourceType,
    winnerIndex: idx,
    sourcesChecked: points.length,
    sourcesAgreeing: agreeing(value),
    discrepancyFlag: true,
    reviewReason: "No authoritative source; unverified",
    breakdown: c.breakdown
  };
}
