import type {
  ProfileContext,
  RetrievedUnit,
  SelectedCluster,
  SupersededValue,
  ThematicCluster,
} from "./types.js";

const MAX_FACTS_PER_EPISODE = 5;

export const EMPTY_PROFILE_CONTEXT: ProfileContext = { attributes: [], superseded: [] };

function isoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word, case-insensitive matchers for stale values, keyed by unit id. */
function staleMatchers(superseded: readonly SupersededValue[]): Map<string, RegExp[]> {
  const byUnit = new Map<string, RegExp[]>();
  for (const s of superseded) {
    const value = s.value.trim();
    if (!value) continue;
    const re = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(value)}($|[^\\p{L}\\p{N}])`, "iu");
    const list = byUnit.get(s.unitId) ?? [];
    list.push(re);
    byUnit.set(s.unitId, list);
  }
  return byUnit;
}

/**
 * Render the text handed to the generation service: the user's current
 * profile attributes, then one numbered section per retrieved unit. Lines of
 * a unit that state a value the profile has since superseded are left out;
 * a unit with nothing left is skipped. Returns "" when there is nothing to
 * show.
 */
export function renderContext(profile: ProfileContext, results: readonly RetrievedUnit[]): string {
  const sections: string[] = [];
  const { attributes } = profile;
  const stale = staleMatchers(profile.superseded);

  if (attributes.length > 0) {
    const lines = attributes.map((a) => `- ${a.attributeName}: ${a.value} (as of ${isoDay(a.timestamp)})`);
    sections.push(`[Current Profile]\n${lines.join("\n")}`);
  }

  let episode = 0;
  for (const r of results) {
    const matchers = stale.get(r.unit.id) ?? [];
    const current = (text: string) => !matchers.some((re) => re.test(text));

    const parts: string[] = [];
    if (current(r.unit.narrative)) parts.push(r.unit.narrative);
    const foresights = r.validForesights.map((f) => f.content).filter(current);
    if (foresights.length > 0) {
      parts.push(`Active Foresights:\n${foresights.map((f) => `  - ${f}`).join("\n")}`);
    }
    const facts = r.unit.atomicFacts.filter(current).slice(0, MAX_FACTS_PER_EPISODE);
    if (facts.length > 0) {
      parts.push(`Key Facts:\n${facts.map((f) => `  - ${f}`).join("\n")}`);
    }
    if (parts.length === 0) continue;

    episode++;
    sections.push(`[Episode ${episode}]\n${parts.join("\n\n")}`);
  }

  return sections.join("\n\n---\n\n");
}

/**
 * Rank clusters by the best fused score among their retrieved members.
 * Ties keep the order in which clusters were first reached.
 */
export function selectClusters(
  results: readonly RetrievedUnit[],
  clusters: readonly ThematicCluster[],
  topK: number,
): SelectedCluster[] {
  const byId = new Map(clusters.map((c) => [c.id, c]));
  const best = new Map<string, number>();
  for (const r of results) {
    const clusterId = r.unit.clusterId;
    if (clusterId === null || !byId.has(clusterId)) continue;
    best.set(clusterId, Math.max(best.get(clusterId) ?? 0, r.fusedScore));
  }

  const selected: SelectedCluster[] = [];
  for (const [id, score] of best) {
    const cluster = byId.get(id);
    if (cluster) selected.push({ cluster, score });
  }
  selected.sort((a, b) => b.score - a.score);
  return selected.slice(0, Math.max(0, topK));
}
