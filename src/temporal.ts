import { randomUUID } from "node:crypto";
import { log } from "./logger.js";
import type { Foresight, ForesightCandidate, RankedUnit, RetrievedUnit } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Both bounds are inclusive; a null end never expires. */
export function isValidAt(foresight: Pick<Foresight, "tStart" | "tEnd">, referenceTime: Date): boolean {
  const r = referenceTime.getTime();
  if (r < foresight.tStart.getTime()) return false;
  if (foresight.tEnd !== null && r > foresight.tEnd.getTime()) return false;
  return true;
}

/**
 * Keep only foresights valid at `referenceTime`. A unit that ends up with no
 * atomic facts and no valid foresight has nothing retrievable and is dropped.
 * Input order is preserved.
 */
export function filterByValidity(candidates: RankedUnit[], referenceTime: Date): RetrievedUnit[] {
  const out: RetrievedUnit[] = [];
  for (const candidate of candidates) {
    const validForesights = candidate.unit.foresights.filter((f) => isValidAt(f, referenceTime));
    if (candidate.unit.atomicFacts.length === 0 && validForesights.length === 0) continue;
    out.push({ ...candidate, validForesights });
  }
  return out;
}

const HINT_UNITS: Record<string, number> = {
  day: 1,
  days: 1,
  week: 7,
  weeks: 7,
  fortnight: 14,
  fortnights: 14,
  month: 30,
  months: 30,
  year: 365,
  years: 365,
};

const HINT_NUMBERS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

/**
 * Parse a free-text duration like "10 days", "for two weeks" or "a month"
 * into a day count. Returns null when no duration is recognised.
 */
export function parseDurationHint(hint: string | null | undefined): number | null {
  if (typeof hint !== "string") return null;
  const match = hint
    .toLowerCase()
    .match(/\b(\d+(?:\.\d+)?|a|an|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)\s+(days?|weeks?|fortnights?|months?|years?)\b/);
  if (!match) return null;
  const rawCount = match[1];
  const count = HINT_NUMBERS[rawCount] ?? Number.parseFloat(rawCount);
  const unit = HINT_UNITS[match[2]];
  if (!Number.isFinite(count) || count <= 0 || unit === undefined) return null;
  return count * unit;
}

function parseExpiryDate(value: string | null): Date | null {
  if (!value) return null;
  const m = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (!m) return null;
  const end = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]), 23, 59, 59, 999));
  return Number.isNaN(end.getTime()) ? null : end;
}

export interface ForesightWindowOptions {
  ongoingDays: number;
}

/**
 * Turn a drafted foresight into a concrete validity window anchored at
 * `referenceTime`. Precedence: explicit expiry date, fixed duration, ongoing
 * review period, free-text hint, otherwise indefinite. Returns null for empty
 * content or a window that would end before it starts.
 */
export function resolveForesightWindow(
  candidate: ForesightCandidate,
  referenceTime: Date,
  options: ForesightWindowOptions,
): Foresight | null {
  const content = candidate.content.trim();
  if (!content) return null;

  const offset =
    typeof candidate.startOffsetDays === "number" && Number.isFinite(candidate.startOffsetDays)
      ? Math.trunc(candidate.startOffsetDays)
      : 0;
  const tStart = new Date(referenceTime.getTime() + offset * DAY_MS);

  let tEnd = parseExpiryDate(candidate.expiryDate);
  if (tEnd === null) {
    if (candidate.durationType === "fixed" && typeof candidate.durationDays === "number" && candidate.durationDays > 0) {
      tEnd = new Date(tStart.getTime() + candidate.durationDays * DAY_MS);
    } else if (candidate.durationType === "ongoing") {
      tEnd = new Date(tStart.getTime() + options.ongoingDays * DAY_MS);
    } else {
      const hintDays = parseDurationHint(candidate.durationHint);
      if (hintDays !== null) tEnd = new Date(tStart.getTime() + hintDays * DAY_MS);
    }
  }

  if (tEnd !== null && tEnd.getTime() < tStart.getTime()) {
    log.debug(`foresight discarded: window ends before it starts (${tEnd.toISOString()} < ${tStart.toISOString()})`);
    return null;
  }

  const confidence =
    typeof candidate.confidence === "number" && Number.isFinite(candidate.confidence)
      ? Math.min(1, Math.max(0, candidate.confidence))
      : 0.8;

  return { id: randomUUID(), content, tStart, tEnd, confidence };
}
