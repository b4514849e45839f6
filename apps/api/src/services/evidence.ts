import type { Evidence } from "../types/claims";
import type { CompetitorConfig } from "./competitors";
import { normalizeSourceType } from "./confidence";
import { extractReadable, hashContent } from "./extract";
import { fetchHtml } from "./fetch";
import { logger as defaultLogger, type Logger } from "./logger";

/**
 * Supplies raw evidence for one competitor. Implementations are read-only.
 */
export interface EvidenceSource {
  load(competitor: CompetitorConfig, signal?: AbortSignal): Promise<Evidence[]>;
}

export function evidenceId(competitorId: string, contentHash: string): string {
  return `ev_${competitorId}_${contentHash.slice(0, 16)}`;
}

export type EvidenceInput = {
  competitorId: string;
  sourceType: string;
  contentText: string;
  fetchedAt: Date;
  sourceUrl?: string | null;
};

export function makeEvidence(input: EvidenceInput): Evidence {
  const contentHash = hashContent(input.contentText);
  return {
    id: evidenceId(input.competitorId, contentHash),
    competitorId: input.competitorId,
    sourceType: normalizeSourceType(input.sourceType),
    sourceUrl: input.sourceUrl ?? null,
    contentHash,
    contentText: input.contentText,
    fetchedAt: input.fetchedAt
  };
}

/**
 * Fixed evidence per competitor, for tests and manual loads.
 */
export class StaticEvidenceSource implements EvidenceSource {
  private readonly byCompetitor = new Map<string, Evidence[]>();

  constructor(items: Array<Evidence | EvidenceInput> = []) {
    for (const item of items) this.add(item);
  }

  add(item: Evidence | EvidenceInput): Evidence {
    const ev = "contentHash" in item ? item : makeEvidence(item);
    const list = this.byCompetitor.get(ev.competitorId) ?? [];
    list.push(ev);
    this.byCompetitor.set(ev.competitorId, list);
    return ev;
  }

  async load(competitor: CompetitorConfig): Promise<Evidence[]> {
    return [...(this.byCompetitor.get(competitor.id) ?? [])];
  }
}

export type WebEvidenceSourceOptions = {
  minChars?: number;
  concurrency?: number;
  logger?: Logger;
};

/**
 * Fetches each configured URL and keeps its readable text. Pages that fail
 * or have too little text are skipped; duplicates by content hash are dropped.
 */
export class WebEvidenceSource implements EvidenceSource {
  private readonly minChars: number;
  private readonly concurrency: number;
  private readonly log: Logger;

  constructor(opts: WebEvidenceSourceOptions = {}) {
    this.minChars = opts.minChars ?? 200;
    this.concurrency = Math.max(1, opts.concurrency ?? 2);
    this.log = opts.logger ?? defaultLogger;
  }

  async load(competitor: CompetitorConfig, signal?: AbortSignal): Promise<Evidence[]> {
    const out: Evidence[] = [];
    const tasks = competitor.sources;
    let idx = 0;

    const worker = async () => {
      while (idx < tasks.length) {
        if (signal?.aborted) return;
        const src = tasks[idx++];
        const page = await fetchHtml(src.url, signal);
        if (page.status < 200 || page.status >= 300 || !page.html) {
          this.log.warn("Evidence fetch skipped", { competitorId: competitor.id, url: src.url, status: page.status });
          continue;
        }

        const doc = await extractReadable(page.html, src.url);
        if (doc.text.length < this.minChars) {
          this.log.debug("Evidence too short", { competitorId: competitor.id, url: src.url, chars: doc.text.length });
          continue;
        }

        out.push(
          makeEvidence({
            competitorId: competitor.id,
            sourceType: src.sourceType,
            sourceUrl: src.url,
            contentText: doc.text,
            fetchedAt: new Date(page.fetchedAt)
          })
        );
      }
    };

    await Promise.all(Array.from({ length: Math.min(this.concurrency, tasks.length) }, () => worker()));

    // Worker completion order is nondeterministic; keep config order.
    const order = new Map(tasks.map((t, i) => [t.url, i]));
    out.sort((a, b) => (order.get(a.sourceUrl ?? "") ?? 0) - (order.get(b.sourceUrl ?? "") ?? 0));

    const seen = new Set<string>();
    return out.filter((e) => {
      if (seen.has(e.contentHash)) return false;
      seen.add(e.contentHash);
      return true;
    });
  }
}
