import type { ChangeEvent, Claim } from "../types/claims";
import type { ConfidenceBreakdown } from "../services/confidence";

const iso = (d: Date | null) => (d ? d.toISOString() : null);

/**
 * Wire shape of a claim.
 */
export function claimJson(c: Claim) {
  return {
    id: c.id,
    competitor_id: c.competitorId,
    claim_type: c.claimType,
    claim_subtype: c.claimSubtype,
    claim_data: c.claimData,
    evidence_ids: c.evidenceIds,
    evidence_quote: c.evidenceQuote,
    confidence: { score: c.confidence.score, level: c.confidence.level },
    status: c.status,
    valid_from: iso(c.validFrom),
    valid_to: iso(c.validTo),
    superseded_by: c.supersededBy,
    extraction_model: c.extractionModel,
    raw_text: c.rawText,
    validated_by: c.validatedBy,
    validation_notes: c.validationNotes,
    created_at: iso(c.createdAt)
  };
}

export function changeEventJson(e: ChangeEvent) {
  return {
    id: e.id,
    competitor_id: e.competitorId,
    previous_claim_id: e.previousClaimId,
    new_claim_id: e.newClaimId,
    change_type: e.changeType,
    severity: e.severity,
    summary: e.summary,
    previous_value: e.previousValue,
    new_value: e.newValue,
    detected_at: iso(e.detectedAt)
  };
}

export function breakdownJson(b: ConfidenceBreakdown) {
  return {
    reliability_score: b.reliabilityScore,
    credibility_score: b.credibilityScore,
    corroboration_bonus: b.corroborationBonus,
    source_bonus: b.sourceBonus,
    freshness_penalty: b.freshnessPenalty,
    raw_score: b.rawScore,
    final_score: b.finalScore
  };
}
