import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadCompetitors, parseCompetitors } from "../competitors";
import { ValidationError } from "../errors";

describe("parseCompetitors", () => {
  it("defaults claim types to every known schema and maps sources", () => {
    const [c] = parseCompetitors([
      { id: "acme", name: "Acme", sources: [{ url: "https://example.com/pricing", source_type: "website_scrape" }] }
    ]);
    expect(c.claimTypes.map((t) => t.type)).toEqual(["pricing", "feature", "positioning", "company_health"]);
    expect(c.claimTypes.every((t) => t.subtype === null)).toBe(true);
    expect(c.sources).toEqual([{ url: "https://example.com/pricing", sourceType: "website_scrape" }]);
  });

  it("accepts subtype targets", () => {
    const [c] = parseCompetitors([
      { id: "acme", name: "Acme", claim_types: ["pricing", { type: "feature", subtype: "sso" }] }
    ]);
    expect(c.claimTypes).toEqual([
      { type: "pricing", subtype: null },
      { type: "feature", subtype: "sso" }
    ]);
    expect(c.sources).toEqual([]);
  });

  it("rejects duplicate ids and unknown claim types", () => {
    const run = () =>
      parseCompetitors([
        { id: "acme", name: "Acme", claim_types: ["pricing"] },
        { id: "acme", name: "Acme again", claim_types: ["weather"] }
      ]);
    expect(run).toThrow(ValidationError);
    expect(run).toThrow("1.id: duplicate id acme; 1.claim_types.0: unknown claim type weather");
  });

  it("rejects malformed source urls", () => {
    expect(() =>
      parseCompetitors([{ id: "acme", name: "Acme", sources: [{ url: "not a url", source_type: "news" }] }])
    ).toThrow(ValidationError);
  });
});

describe("loadCompetitors", () => {
  it("loads the bundled config", () => {
    const path = fileURLToPath(new URL("../../../config/competitors.json", import.meta.url));
    const list = loadCompetitors(path);
    expect(list.map((c) => c.id)).toEqual(["northwind-health", "contoso-care"]);
    expect(list[1].claimTypes[1]).toEqual({ type: "feature", subtype: "ehr_integration" });
  });

  it("reports a missing file as a validation error", () => {
    expect(() => loadCompetitors("/nonexistent/competitors.json")).toThrow(/Cannot read competitors file/);
  });
});
