import { z } from "zod";

export type ExtractedFields = Record<string, unknown | null>;

export type FieldSpec = {
  name: string;
  hint: string;
  schema: z.ZodTypeAny;
};

export type ClaimSchema = {
  claimType: string;
  description: string;
  fields: FieldSpec[];
  /** Type-specific addition to the raw extraction confidence. */
  bonus: (fields: ExtractedFields) => number;
};

const present = (v: unknown) => v !== null && v !== undefined && v !== "";
const nonEmptyList = (v: unknown) => Array.isArray(v) && v.length > 0;
const strings = z.array(z.string().min(1));

export const PRICING_SCHEMA: ClaimSchema = {
  claimType: "pricing",
  description: "Published pricing: model, headline price and plan structure.",
  fields: [
    {
      name: "pricing_model",
      hint: "one of per_user | per_facility | flat | usage_based | custom | unknown",
      schema: z.enum(["per_user", "per_facility", "flat", "usage_based", "custom", "unknown"])
    },
    { name: "base_price", hint: "lowest listed price as a number, no currency symbol", schema: z.number().nonnegative() },
    { name: "price_unit", hint: 'what the price is charged per, e.g. "per user per month"', schema: z.string().min(1) },
    { name: "currency", hint: "ISO currency code", schema: z.string().min(3).max(3) },
    { name: "free_tier", hint: "true if a free plan exists", schema: z.boolean() },
    { name: "enterprise_pricing", hint: 'how enterprise pricing is offered, e.g. "contact sales"', schema: z.string().min(1) }
  ],
  bonus: (f) => {
    let b = 0;
    if (typeof f.base_price === "number") b += 0.15;
    if (present(f.pricing_model) && f.pricing_model !== "unknown") b += 0.05;
    return b;
  }
};

export const FEATURE_SCHEMA: ClaimSchema = {
  claimType: "feature",
  description: "One product capability and how it is packaged.",
  fields: [
    { name: "feature_name", hint: "short feature name", schema: z.string().min(1) },
    {
      name: "feature_category",
      hint: "one of core | integration | security | compliance | analytics | automation | other",
      schema: z.enum(["core", "integration", "security", "compliance", "analytics", "automation", "other"])
    },
    { name: "description", hint: "one sentence", schema: z.string().min(1) },
    { name: "is_premium", hint: "true if only in paid add-ons or higher tiers", schema: z.boolean() },
    { name: "integration_partners", hint: "named third-party systems", schema: strings }
  ],
  bonus: (f) => {
    let b = 0;
    if (present(f.description)) b += 0.1;
    if (present(f.feature_category) && f.feature_category !== "other") b += 0.1;
    return b;
  }
};

export const POSITIONING_SCHEMA: ClaimSchema = {
  claimType: "positioning",
  description: "Who the company sells to and how it differentiates.",
  fields: [
    { name: "target_segments", hint: "customer segments or verticals", schema: strings },
    { name: "value_propositions", hint: "stated benefits", schema: strings },
    { name: "differentiators", hint: "claims of superiority over alternatives", schema: strings },
    {
      name: "tone",
      hint: "one of enterprise | startup | professional | friendly | technical",
      schema: z.enum(["enterprise", "startup", "professional", "friendly", "technical"])
    }
  ],
  bonus: (f) => {
    let b = 0;
    if (nonEmptyList(f.target_segments)) b += 0.1;
    if (nonEmptyList(f.value_propositions)) b += 0.1;
    return b;
  }
};

export const COMPANY_HEALTH_SCHEMA: ClaimSchema = {
  claimType: "company_health",
  description: "Size and funding signals.",
  fields: [
    { name: "customer_count", hint: "number of customers as an integer", schema: z.number().int().nonnegative() },
    { name: "employee_count", hint: "number of employees as an integer", schema: z.number().int().nonnegative() },
    { name: "funding_total", hint: 'total funding as stated, e.g. "$45M"', schema: z.string().min(1) },
    { name: "year_founded", hint: "four-digit year", schema: z.number().int().min(1800).max(2100) },
    { name: "headquarters", hint: "city and region", schema: z.string().min(1) }
  ],
  bonus: (f) => {
    let b = 0;
    if (typeof f.customer_count === "number" || typeof f.employee_count === "number") b += 0.1;
    if (present(f.funding_total)) b += 0.05;
    return b;
  }
};

export const CLAIM_SCHEMAS: Record<string, ClaimSchema> = {
  pricing: PRICING_SCHEMA,
  feature: FEATURE_SCHEMA,
  positioning: POSITIONING_SCHEMA,
  company_health: COMPANY_HEALTH_SCHEMA
};

export function getClaimSchema(claimType: string): ClaimSchema | null {
  return CLAIM_SCHEMAS[claimType] ?? null;
}

/**
 * The JSON shape the model is asked to produce, sent as the system prompt.
 */
export function answerShape(schema: ClaimSchema): string {
  const fields = schema.fields.map((f) => `"${f.name}":{"value":<${f.hint} or null>,"quote":<exact evidence text or null>}`);
  return `{"fields":{${fields.join(",")}},"reasoning":"<one or two sentences>"}`;
}
