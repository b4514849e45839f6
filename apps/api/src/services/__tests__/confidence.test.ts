import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors";
import {
  calculateConfidenceScore,
  calculateDataStaleness,
  credibilityFromExtraction,
  isEmptyValue,
  normalizeSourceType,
  triangulateDataPoints,
  type Reliability
} from "../confidence";
import { SOURCE_TYPES } from "../../types/claims";

describe("calculateConfidenceScore", () => {
  it("scores a corroborated filing at the cap", () => {
    const r = calculateConfidenceScore({ sourceType: "sec_filing", corroboratingSources: 2, dataAgeDays: 0 });
    expect(r.breakdown).toEqual({
      reliabilityScore: 50,
      credibilityScore: 30,
      corroborationBonus: 10,
      sourceBonus: 10,
      freshnessPenalty: 0,
      rawScore: 100,
      finalScore: 100
    });
    expect(r.score).toBe(100);
    expect(r.level).toBe("high");
  });

  it("uses source defaults for a website", () => {
    const r = calculateConfidenceScore({ sourceType: "website_scrape" });
    expect(r.score).toBe(35);
    expect(r.level).toBe("low");
  });

  it("gives news a moderate score", () => {
    expect(calculateConfidenceScore({ sourceType: "news" }).score).toBe(48);
    expect(calculateConfidenceScore({ sourceType: "news" }).level).toBe("moderate");
  });

  it("applies explicit reliability and credibility", () => {
    const r = calculateConfidenceScore({ sourceType: "website", reliability: "b", credibility: 2 });
    expect(r.breakdown.reliabilityScore).toBe(40);
    expect(r.breakdown.credibilityScore).toBe(25);
    expect(r.score).toBe(65);
  });

  it("penalises stale data one point per 30 days, capped at 15", () => {
    expect(calculateConfidenceScore({ sourceType: "filing", dataAgeDays: 400 }).score).toBe(77);
    expect(calculateConfidenceScore({ sourceType: "filing", dataAgeDays: 10_000 }).breakdown.freshnessPenalty).toBe(15);
  });

  it("caps corroboration at 15", () => {
    expect(calculateConfidenceScore({ sourceType: "news", corroboratingSources: 9 }).breakdown.corroborationBonus).toBe(15);
  });

  it("clamps negative raw scores to zero", () => {
    const r = calculateConfidenceScore({ sourceType: "unknown", dataAgeDays: 90 });
    expect(r.breakdown.rawScore).toBe(-3);
    expect(r.score).toBe(0);
  });

  it("rejects out-of-range inputs", () => {
    expect(() => calculateConfidenceScore({ sourceType: "filing", credibility: 7 })).toThrow(ValidationError);
    expect(() => calculateConfidenceScore({ sourceType: "filing", reliability: "Z" })).toThrow(ValidationError);
    expect(() => calculateConfidenceScore({ sourceType: "filing", dataAgeDays: -1 })).toThrow(ValidationError);
  });

  it("always stays within 0..100", () => {
    const reliabilities: Reliability[] = ["A", "B", "C", "D", "E", "F"];
    for (const sourceType of SOURCE_TYPES) {
      for (const reliability of reliabilities) {
        for (let credibility = 1; credibility <= 6; credibility++) {
          for (const corroboratingSources of [0, 1, 3, 10]) {
            for (const dataAgeDays of [0, 45, 5000]) {
              const { score } = calculateConfidenceScore({
                sourceType,
                reliability,
                credibility,
                corroboratingSources,
                dataAgeDays
              });
              expect(Number.isInteger(score)).toBe(true);
              expect(score).toBeGreaterThanOrEqual(0);
              expect(score).toBeLessThanOrEqual(100);
            }
          }
        }
      }
    }
  });
});

describe("source types", () => {
  it("normalises aliases and unknown names", () => {
    expect(normalizeSourceType("SEC_Filing")).toBe("filing");
    expect(normalizeSourceType("crunchbase")).toBe("database");
    expect(normalizeSourceType("definitive_hc")).toBe("analyst_report");
    expect(normalizeSourceType("blog")).toBe("unknown");
    expect(normalizeSourceType(null)).toBe("unknown");
  });

  it("degrades credibility for low extraction confidence", () => {
    expect(credibilityFromExtraction("website", 0.9)).toBe(4);
    expect(credibilityFromExtraction("website", 0.75)).toBe(5);
    expect(credibilityFromExtraction("website", 0.5)).toBe(6);
    expect(credibilityFromExtraction("filing", 0.5)).toBe(3);
    expect(credibilityFromExtraction("unknown", 0.5)).toBe(6);
  });

  it("computes staleness in whole days", () => {
    expect(calculateDataStaleness(new Date("2026-01-01T00:00:00Z"), new Date("2026-01-31T12:00:00Z"))).toBe(30);
    expect(calculateDataStaleness(new Date("2026-02-01T00:00:00Z"), new Date("2026-01-01T00:00:00Z"))).toBe(0);
  });
});

describe("triangulateDataPoints", () => {
  it("returns zero confidence with the discrepancy flag for no sources", () => {
    const r = triangulateDataPoints([]);
    expect(r.score).toBe(0);
    expect(r.discrepancyFlag).toBe(true);
    expect(r.bestValue).toBeNull();
    expect(r.reviewReason).toBe("No sources available");
  });

  it("prefers the filing over the website", () => {
    const r = triangulateDataPoints([
      { sourceType: "website_scrape", value: "$99" },
      { sourceType: "sec_filing", value: "$120" }
    ]);
    expect(r.bestValue).toBe("$120");
    expect(r.sourceUsed).toBe("filing");
    expect(r.winnerIndex).toBe(1);
    expect(r.score).toBe(95);
    expect(r.discrepancyFlag).toBe(false);
    expect(r.sourcesAgreeing).toBe(1);
  });

  it("picks the same authoritative value regardless of order", () => {
    const r = triangulateDataPoints([
      { sourceType: "sec_filing", value: "$120" },
      { sourceType: "website_scrape", value: "$99" }
    ]);
    expect(r.bestValue).toBe("$120");
    expect(r.winnerIndex).toBe(0);
    expect(r.score).toBe(95);
  });

  it("follows the authority order between authoritative sources", () => {
    const r = triangulateDataPoints([
      { sourceType: "analyst_report", value: 100 },
      { sourceType: "manual_verified", value: 110 },
      { sourceType: "filing", value: 120 }
    ]);
    expect(r.bestValue).toBe(120);
    expect(r.sourceUsed).toBe("filing");
  });

  it("skips empty authoritative values", () => {
    const r = triangulateDataPoints([
      { sourceType: "filing", value: "unknown" },
      { sourceType: "analyst_report", value: "$80" }
    ]);
    expect(r.bestValue).toBe("$80");
    expect(r.sourceUsed).toBe("analyst_report");
    expect(r.score).toBe(40 + 25 + 5 + 8);
  });

  it("flags an uncorroborated non-authoritative value for review", () => {
    const r = triangulateDataPoints([
      { sourceType: "website", value: null },
      { sourceType: "news", value: "$99" },
      { sourceType: "website", value: "$99" }
    ]);
    expect(r.bestValue).toBe("$99");
    expect(r.sourceUsed).toBe("news");
    expect(r.score).toBe(48);
    expect(r.discrepancyFlag).toBe(true);
    expect(r.reviewReason).toBe("No authoritative source; unverified");
    expect(r.sourcesAgreeing).toBe(2);
  });

  it("reports when no source has a value", () => {
    const r = triangulateDataPoints([
      { sourceType: "website", value: null },
      { sourceType: "news", value: "" }
    ]);
    expect(r.bestValue).toBeNull();
    expect(r.sourcesChecked).toBe(2);
    expect(r.reviewReason).toBe("No values available from any source");
  });

  it("compares object values structurally", () => {
    const r = triangulateDataPoints([
      { sourceType: "filing", value: { base_price: 120, currency: "USD" } },
      { sourceType: "website", value: { currency: "USD", base_price: 120 } }
    ]);
    expect(r.sourcesAgreeing).toBe(2);
  });
});

describe("isEmptyValue", () => {
  it("treats blank, unknown and all-null objects as empty", () => {
    expect(isEmptyValue(" ")).toBe(true);
    expect(isEmptyValue("Unknown")).toBe(true);
    expect(isEmptyValue([])).toBe(true);
    expect(isEmptyValue({ a: null, b: "" })).toBe(true);
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
    expect(isEmptyValue({ a: null, b: false })).toBe(false);
  });
});
