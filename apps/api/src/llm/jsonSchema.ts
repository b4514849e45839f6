export function jsonOnlySystemPrompt(instruction: string): string {
  return [
    "You MUST output ONLY valid JSON.",
    "No markdown. No prose. No code fences.",
    `JSON Spec: ${instruction}`
  ].join("\n");
}

/**
 * Slice from the first "{" or "[" to the last "}" or "]". Returns null when
 * there is no such range.
 */
export function braceRange(text: string): string | null {
  const t = text.trim();
  const firstObj = t.indexOf("{");
  const firstArr = t.indexOf("[");
  const start = firstObj === -1 ? firstArr : firstArr === -1 ? firstObj : Math.min(firstObj, firstArr);
  if (start === -1) return null;

  const end = Math.max(t.lastIndexOf("}"), t.lastIndexOf("]"));
  if (end <= start) return null;

  return t.slice(start, end + 1);
}

export type JsonParseResult = { ok: true; value: unknown; repaired: boolean } | { ok: false; error: string };

/**
 * Strict parse first, then one repair attempt on the brace-delimited range.
 */
export function parseJsonLenient(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text.trim()), repaired: false };
  } catch {
    const slice = braceRange(text);
    if (slice === null) return { ok: false, error: "Model did not return JSON." };
    try {
      return { ok: true, value: JSON.parse(slice), repaired: true };
    } catch {
      return { ok: false, error: "Model returned malformed JSON." };
    }
  }
}
