import type { z } from "zod";

/**
 * Recover a JSON payload from free-form model output. Handles fenced ```json
 * blocks, prose around the payload, and several candidate blocks in one reply.
 */

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

export function extractJsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim());
  const candidates = [cleaned, ...scanBalancedJsonBlocks(cleaned)];

  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of candidates) {
    const c = raw.trim();
    if (c.length === 0 || seen.has(c)) continue;
    seen.add(c);
    out.push(c);
  }
  return out;
}

/** First candidate that parses as JSON and satisfies `schema`, else null. */
export function parseJsonWithSchema<T>(text: string, schema: z.ZodType<T>): T | null {
  for (const candidate of extractJsonCandidates(text)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) return result.data;
  }
  return null;
}

function scanBalancedJsonBlocks(text: string): string[] {
  const out: string[] = [];
  const closers: Record<string, string> = { "{": "}", "[": "]" };

  for (let i = 0; i < text.length; i++) {
    const open = text[i];
    const close = closers[open];
    if (!close) continue;

    let depth = 0;
    let inString = false;
    let escape = false;

    for (let j = i; j < text.length; j++) {
      const ch = text[j];

      if (inString) {
        if (escape) escape = false;
        else if (ch === "\\") escape = true;
        else if (ch === "\"") inString = false;
        continue;
      }
      if (ch === "\"") {
        inString = true;
        continue;
      }

      if (ch === open) depth++;
      else if (ch === close) depth--;

      if (depth === 0) {
        out.push(text.slice(i, j + 1));
        i = j;
        break;
      }
    }
  }

  return out;
}
