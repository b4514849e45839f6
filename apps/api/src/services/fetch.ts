import { Agent, request } from "undici";
import { z } from "zod";
import { cacheGetJson, cacheSetJson } from "./cache";
import { logDebug } from "./logger";

const FetchResultSchema = z.object({
  url: z.string(),
  status: z.number(),
  contentType: z.string(),
  html: z.string(),
  fetchedAt: z.string()
});

export type FetchResult = z.infer<typeof FetchResultSchema>;

const agent = new Agent({
  connect: {
    timeout: 4_000
  }
});

const PAGE_TTL_SECONDS = 6 * 60 * 60;

function cacheKey(url: string) {
  return `page:v1:${url}`;
}

function isHtml(contentType: string) {
  return contentType.toLowerCase().includes("text/html");
}

/**
 * Never throws: failures come back as status=0 with empty html. A hard
 * timeout bounds every request; an external signal (job timeout) also aborts it.
 */
export async function fetchHtml(url: string, signal?: AbortSignal): Promise<FetchResult> {
  const cached = await cacheGetJson(cacheKey(url), FetchResultSchema);
  if (cached) return cached;

  const abort = new AbortController();
  const hardTimeout = setTimeout(() => abort.abort(), 8_000);
  const onExternalAbort = () => abort.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  const failed = (): FetchResult => ({ url, status: 0, contentType: "", html: "", fetchedAt: new Date().toISOString() });

  try {
    const res = await request(url, {
      method: "GET",
      headers: {
        "User-Agent": "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Claimwatch/1.0",
        Accept: "text/html,application/xhtml+xml"
      },
      dispatcher: agent,
      signal: abort.signal,
      headersTimeout: 5_000,
      bodyTimeout: 7_000
    });

    const status = res.statusCode;
    const contentType = String(res.headers["content-type"] ?? "");
    const ok = status >= 200 && status < 300 && isHtml(contentType);

    // The body is always consumed so the connection returns to the pool.
    const body = await res.body.text();
    const out: FetchResult = { url, status, contentType, html: ok ? body : "", fetchedAt: new Date().toISOString() };

    if (ok && out.html) await cacheSetJson(cacheKey(url), out, PAGE_TTL_SECONDS);
    return out;
  } catch (err) {
    logDebug("Fetch failed", { url, error: err instanceof Error ? err.message : String(err) });
    return failed();
  } finally {
    clearTimeout(hardTimeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
