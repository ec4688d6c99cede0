const STOPWORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "but",
  "by",
  "did",
  "do",
  "does",
  "for",
  "from",
  "has",
  "have",
  "how",
  "i",
  "in",
  "is",
  "it",
  "of",
  "on",
  "or",
  "that",
  "the",
  "this",
  "to",
  "was",
  "were",
  "what",
  "when",
  "where",
  "which",
  "who",
  "with",
]);

export interface TokenizeOptions {
  minTokenLen?: number;
  keepStopwords?: boolean;
}

export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
  if (typeof text !== "string") return [];
  const minTokenLen = options.minTokenLen ?? 2;
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((t) => t.length >= minTokenLen)
    .filter((t) => options.keepStopwords === true || !STOPWORDS.has(t));
}

/**
 * Deterministic alternative phrasings built from the most salient tokens of
 * `query`. Used when the generation service cannot reformulate. The input
 * query itself is never returned.
 */
export function salientRephrasings(query: string, maxQueries = 3): string[] {
  const trimmed = query.trim();
  if (!trimmed) return [];

  // First-seen tokens win.
  const uniq: string[] = [];
  for (const t of tokenize(trimmed, { minTokenLen: 3 })) {
    if (!uniq.includes(t)) uniq.push(t);
  }
  if (uniq.length === 0) return [];

  const candidates = [
    uniq.slice(0, 3).join(" "),
    uniq.slice(0, 2).join(" "),
    uniq[0],
    uniq[1],
  ];

  const out: string[] = [];
  const normalizedQuery = trimmed.toLowerCase();
  for (const c of candidates) {
    if (out.length >= maxQueries) break;
    if (!c || c === normalizedQuery || out.includes(c)) continue;
    out.push(c);
  }
  return out;
}
