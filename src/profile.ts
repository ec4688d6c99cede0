import { randomUUID } from "node:crypto";
import { log } from "./logger.js";
import type {
  ConflictRecord,
  ImplicitTrait,
  ProfileAnalysis,
  ProfileAttribute,
  SupersededValue,
  UserProfile,
} from "./types.js";

export function createProfile(userId: string, now: Date = new Date()): UserProfile {
  return {
    userId,
    explicitAttributes: {},
    implicitTraits: [],
    conflictHistory: [],
    sourceClusterIds: [],
    updatedAt: now,
  };
}

export function getAttribute(profile: UserProfile, name: string): ProfileAttribute | undefined {
  return Object.hasOwn(profile.explicitAttributes, name) ? profile.explicitAttributes[name] : undefined;
}

function setAttribute(profile: UserProfile, attribute: ProfileAttribute): void {
  // defineProperty so names like "__proto__" stay plain keys
  Object.defineProperty(profile.explicitAttributes, attribute.attributeName, {
    value: { ...attribute },
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Apply newly extracted attribute facts to `profile` in order.
 *
 * - unknown attribute: inserted, no conflict
 * - same value: no-op (the stored timestamp is kept)
 * - different value: a ConflictRecord is appended to the history; the incoming
 *   fact wins when its timestamp is >= the stored one, so a late-arriving but
 *   older fact never overrides a newer value
 *
 * Returns the records produced by this call.
 */
export function resolveProfileFacts(
  profile: UserProfile,
  facts: readonly ProfileAttribute[],
  detectedAt: Date = new Date(),
): ConflictRecord[] {
  const conflicts: ConflictRecord[] = [];

  for (const fact of facts) {
    const existing = getAttribute(profile, fact.attributeName);
    if (!existing) {
      setAttribute(profile, fact);
      continue;
    }
    if (existing.value === fact.value) continue;

    const override = fact.timestamp.getTime() >= existing.timestamp.getTime();
    const record: ConflictRecord = {
      id: randomUUID(),
      attributeName: fact.attributeName,
      oldValue: existing.value,
      newValue: fact.value,
      oldTimestamp: existing.timestamp,
      newTimestamp: fact.timestamp,
      oldSourceUnitId: existing.sourceUnitId,
      newSourceUnitId: fact.sourceUnitId,
      resolutionStrategy: "recency",
      outcome: override ? "override" : "retain",
      detectedAt,
    };
    profile.conflictHistory.push(record);
    conflicts.push(record);

    if (override) setAttribute(profile, fact);
    log.debug(
      `profile ${profile.userId}: conflict on "${fact.attributeName}" resolved by recency (${record.outcome})`,
    );
  }

  if (facts.length > 0) profile.updatedAt = detectedAt;
  return conflicts;
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/** Same trait type and word overlap above half of the shorter description. */
export function traitsSimilar(
  a: Pick<ImplicitTrait, "traitType" | "description">,
  b: Pick<ImplicitTrait, "traitType" | "description">,
): boolean {
  if (a.traitType !== b.traitType) return false;
  const wa = words(a.description);
  const wb = words(b.description);
  if (wa.size === 0 || wb.size === 0) return false;
  let shared = 0;
  for (const w of wa) if (wb.has(w)) shared++;
  return shared / Math.min(wa.size, wb.size) > 0.5;
}

export function mergeTraits(
  profile: UserProfile,
  traits: ProfileAnalysis["implicitTraits"],
  sourceUnitId: string,
  now: Date = new Date(),
): void {
  for (const incoming of traits) {
    const description = incoming.description.trim();
    if (!description) continue;
    const existing = profile.implicitTraits.find((t) =>
      traitsSimilar(t, { traitType: incoming.traitType, description }),
    );
    if (existing) {
      existing.strength = (existing.strength + incoming.strength) / 2;
      if (!existing.evidence.includes(sourceUnitId)) existing.evidence.push(sourceUnitId);
      existing.lastUpdated = now;
      continue;
    }
    profile.implicitTraits.push({
      traitType: incoming.traitType,
      description,
      strength: incoming.strength,
      evidence: [sourceUnitId],
      lastUpdated: now,
    });
  }
}

export function liveAttributes(profile: UserProfile): ProfileAttribute[] {
  return Object.values(profile.explicitAttributes).sort((a, b) =>
    a.attributeName < b.attributeName ? -1 : a.attributeName > b.attributeName ? 1 : 0,
  );
}

/**
 * Values that lost a recency conflict and are not the live value again:
 * the old value of an override, or the incoming value of a retain.
 */
export function supersededValues(profile: UserProfile): SupersededValue[] {
  const out: SupersededValue[] = [];
  for (const c of profile.conflictHistory) {
    const stale =
      c.outcome === "override"
        ? { attributeName: c.attributeName, value: c.oldValue, unitId: c.oldSourceUnitId }
        : { attributeName: c.attributeName, value: c.newValue, unitId: c.newSourceUnitId };
    if (getAttribute(profile, c.attributeName)?.value === stale.value) continue;
    out.push(stale);
  }
  return out;
}

export function renderProfileSummary(profile: UserProfile, recentConflicts = 5): string {
  const lines = [`User Profile (${profile.userId})`, ""];

  lines.push("## Explicit attributes");
  const attributes = liveAttributes(profile);
  if (attributes.length === 0) lines.push("- (none)");
  for (const a of attributes) lines.push(`- ${a.attributeName}: ${a.value}`);
  lines.push("");

  lines.push("## Implicit traits");
  if (profile.implicitTraits.length === 0) lines.push("- (none)");
  for (const t of profile.implicitTraits) {
    lines.push(`- [${t.traitType}] ${t.description} (strength ${t.strength.toFixed(2)})`);
  }

  if (profile.conflictHistory.length > 0) {
    lines.push("");
    lines.push("## Conflict history");
    for (const c of profile.conflictHistory.slice(-recentConflicts)) {
      lines.push(`- ${c.attributeName}: ${c.oldValue} -> ${c.newValue} (${c.resolutionStrategy}, ${c.outcome})`);
    }
  }

  return lines.join("\n");
}
