import { ExtractionError, errorMessage } from "./errors.js";
import type { LlmClient } from "./llm.js";
import { log } from "./logger.js";
import {
  type ExtractionResult,
  ExtractionResultSchema,
  ProfileAnalysisSchema,
  SummarySchema,
  ThemeSchema,
} from "./schemas.js";
import type {
  ClusterDescriber,
  ConversationTurn,
  ExtractionService,
  ForesightCandidate,
  MemoryUnit,
  MemoryUnitDraft,
  ProfileAnalysis,
  ProfileAnalyzer,
} from "./types.js";

const MAX_THEME_WORDS = 5;

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** "Dietary Preference" / "dietaryPreference" / "dietary-preference" -> "dietary_preference" */
export function toSnakeCase(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "_")
    .replace(/^_+|_+$/g, "");
}

export function formatTranscript(turns: readonly ConversationTurn[]): string {
  return turns
    .map((t) => (t.timestamp ? `[${t.timestamp}] [${t.speaker}] ${t.text}` : `[${t.speaker}] ${t.text}`))
    .join("\n\n");
}

function cleanDraft(draft: MemoryUnitDraft): MemoryUnitDraft | null {
  const narrative = draft.narrative.trim();
  if (narrative.length === 0) return null;
  const atomicFacts = draft.atomicFacts.map((f) => f.trim()).filter((f) => f.length > 0);
  const foresightCandidates: ForesightCandidate[] = draft.foresightCandidates
    .map((c) => ({ ...c, content: c.content.trim() }))
    .filter((c) => c.content.length > 0);
  return { narrative, atomicFacts, foresightCandidates };
}

/**
 * LLM-backed drafting and analysis: turns transcripts into memory-unit drafts,
 * reads profile facts and traits out of a unit, and names/summarises clusters.
 */
export class ExtractionEngine implements ExtractionService, ProfileAnalyzer, ClusterDescriber {
  constructor(private readonly llm: LlmClient) {}

  async extract(turns: ConversationTurn[], referenceTime: Date): Promise<MemoryUnitDraft[]> {
    const substantive = turns.filter((t) => t.text.trim().length > 0);
    if (substantive.length === 0) {
      log.debug("extraction skipped: no substantive turns");
      return [];
    }

    let result: ExtractionResult;
    try {
      result = await this.llm.parse(
        "extraction",
        ExtractionResultSchema,
        "memory_unit_drafts",
        this.buildExtractionInstructions(referenceTime),
        formatTranscript(substantive),
      );
    } catch (err) {
      log.error("extraction failed", err);
      throw new ExtractionError(`extraction failed: ${errorMessage(err)}`, { cause: err });
    }

    const drafts: MemoryUnitDraft[] = [];
    for (const unit of result.units) {
      const cleaned = cleanDraft(unit);
      if (cleaned) drafts.push(cleaned);
    }
    log.debug(`extraction: ${drafts.length} draft(s) from ${substantive.length} turn(s)`);
    return drafts;
  }

  private buildExtractionInstructions(referenceTime: Date): string {
    return `You are a memory extraction system. Split the conversation into episodes and write one memory unit per episode.

For each unit:
- narrative: a third-person, self-contained account. Resolve pronouns and relative dates against the conversation date.
- atomicFacts: short standalone claims, one fact each. Include facts the user states about themselves.
- foresightCandidates: forward-looking statements (plans, temporary states, expected changes). Give an explicit end date as expiryDate when one is stated; otherwise describe the duration with durationType, durationDays and durationHint.

Skip greetings, small talk and transient task chatter. Return an empty list when nothing is worth remembering.

Conversation date: ${referenceTime.toISOString().slice(0, 10)}`;
  }

  async analyze(unit: MemoryUnit): Promise<ProfileAnalysis> {
    const facts = unit.atomicFacts.length > 0 ? unit.atomicFacts.map((f) => `- ${f}`).join("\n") : "(none)";
    const result = await this.llm.parse(
      "profile-analysis",
      ProfileAnalysisSchema,
      "profile_analysis",
      `You are a user profiling system. From one memory of the user, extract:
- explicitFacts: attributes the user states about themselves (diet, location, employer, relationships, ...). Use snake_case attribute names and reuse common names where possible.
- implicitTraits: preferences, habits or personality traits suggested by behaviour, with a strength between 0 and 1.

Only include what the memory supports. Return empty lists when nothing applies.`,
      `Narrative:\n${unit.narrative}\n\nFacts:\n${facts}`,
    );

    const explicitFacts: ProfileAnalysis["explicitFacts"] = [];
    for (const fact of result.explicitFacts) {
      const attributeName = toSnakeCase(fact.attributeName);
      const value = fact.value.trim();
      if (!attributeName || !value) continue;
      explicitFacts.push({ attributeName, value, confidence: clamp01(fact.confidence) });
    }

    const implicitTraits: ProfileAnalysis["implicitTraits"] = result.implicitTraits
      .map((t) => ({ traitType: t.traitType, description: t.description.trim(), strength: clamp01(t.strength) }))
      .filter((t) => t.description.length > 0);

    return { explicitFacts, implicitTraits };
  }

  async describeTheme(narratives: string[]): Promise<string> {
    const result = await this.llm.parse(
      "cluster-theme",
      ThemeSchema,
      "cluster_theme",
      "Name the common theme of these memories in 2-5 words. No punctuation at the end.",
      narratives.map((n, i) => `${i + 1}. ${n}`).join("\n"),
    );
    const label = result.themeLabel.trim().split(/\s+/).slice(0, MAX_THEME_WORDS).join(" ");
    if (!label) throw new Error("empty theme label");
    return label;
  }

  async updateSummary(summary: string, narrative: string): Promise<string> {
    const result = await this.llm.parse(
      "cluster-summary",
      SummarySchema,
      "cluster_summary",
      "You maintain a short summary of a group of related memories. Fold the new memory into the existing summary without dropping earlier points. Keep it to a few sentences.",
      `Current summary:\n${summary || "(empty)"}\n\nNew memory:\n${narrative}`,
    );
    const updated = result.summary.trim();
    if (!updated) throw new Error("empty cluster summary");
    return updated;
  }
}
