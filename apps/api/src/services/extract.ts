import { createHash } from "node:crypto";
import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";
import { z } from "zod";
import { cacheGetJson, cacheSetJson } from "./cache";
import { logWarning } from "./logger";

const ReadableDocSchema = z.object({
  title: z.string(),
  text: z.string(),
  contentHash: z.string()
});

export type ReadableDoc = z.infer<typeof ReadableDocSchema>;

const DOC_TTL_SECONDS = 24 * 60 * 60;

export function hashContent(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

function cacheKey(url: string, html: string) {
  return `readable:v1:${url}:${hashContent(html).slice(0, 16)}`;
}

/**
 * Readability over JSDOM. CSS parse noise is silenced; the result is cached
 * per page version.
 */
export async function extractReadable(html: string, url: string): Promise<ReadableDoc> {
  const key = cacheKey(url, html);
  const cached = await cacheGetJson(key, ReadableDocSchema);
  if (cached) return cached;

  const virtualConsole = new VirtualConsole();
  virtualConsole.on("jsdomError", (err: Error) => {
    if (err.message.includes("Could not parse CSS stylesheet")) return;
    logWarning("JSDOM error", { url, error: err.message });
  });

  const dom = new JSDOM(html, { url, virtualConsole });
  const article = new Readability(dom.window.document).parse();
  dom.window.close();

  const title = article?.title?.trim() || new URL(url).hostname;
  const text = (article?.textContent ?? "").replace(/[ \t]+\n/g, "\n").replace(/\n{3,}/g, "\n\n").trim();

  const doc: ReadableDoc = { title, text, contentHash: hashContent(text) };
  await cacheSetJson(key, doc, DOC_TTL_SECONDS);
  return doc;
}
