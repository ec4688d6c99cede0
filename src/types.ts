export type ReasoningEffort = "none" | "low" | "medium" | "high";
export type TraitType = "preference" | "habit" | "personality";
export type ForesightDurationType = "fixed" | "ongoing" | "indefinite";
export type ResolutionStrategy = "recency";
export type ConflictOutcome = "override" | "retain";

export interface EngineConfig {
  openaiApiKey: string | undefined;
  openaiBaseUrl?: string;
  model: string;
  reasoningEffort: ReasoningEffort;
  embeddingModel: string;
  /** Fixed vector length; embeddings of another length are rejected. */
  embeddingDimensions: number;
  databasePath: string;
  debug: boolean;
  // Consolidation
  clusterSimilarityThreshold: number;
  /** Review window (days) for foresights extracted as "ongoing" without an end. */
  ongoingForesightDays: number;
  // Retrieval
  rrfK: number;
  /** Each index is asked for twice this many candidates per search. */
  searchTopK: number;
  maxContextUnits: number;
  clusterSelectionTopK: number;
  maxQueryRewrites: number;
  /** Wall-clock budget for one recall (all search/evaluate/reformulate cycles). */
  recallTimeoutMs: number;
  llmTimeoutMs: number;
}

export interface ConversationTurn {
  speaker: string;
  text: string;
  /** ISO 8601 */
  timestamp?: string;
}

/** Forward-looking statement as drafted by extraction, before its window is resolved. */
export interface ForesightCandidate {
  content: string;
  confidence: number | null;
  startOffsetDays: number | null;
  /** YYYY-MM-DD */
  expiryDate: string | null;
  durationType: ForesightDurationType;
  durationDays: number | null;
  /** Free text such as "for two weeks" or "10 days". */
  durationHint: string | null;
}

export interface MemoryUnitDraft {
  narrative: string;
  atomicFacts: string[];
  foresightCandidates: ForesightCandidate[];
}

export interface Foresight {
  id: string;
  content: string;
  tStart: Date;
  /** null = valid indefinitely */
  tEnd: Date | null;
  confidence: number;
}

export interface MemoryUnit {
  id: string;
  userId: string;
  narrative: string;
  atomicFacts: string[];
  foresights: Foresight[];
  createdAt: Date;
  clusterId: string | null;
  embedding: number[];
}

export interface ThematicCluster {
  id: string;
  userId: string;
  themeLabel: string;
  summary: string;
  memberIds: string[];
  centroid: number[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ProfileAttribute {
  attributeName: string;
  value: string;
  timestamp: Date;
  sourceUnitId: string;
  confidence: number;
}

/** A value the profile no longer holds, tied to the unit it was extracted from. */
export interface SupersededValue {
  attributeName: string;
  value: string;
  unitId: string;
}

export interface ProfileContext {
  attributes: readonly ProfileAttribute[];
  superseded: readonly SupersededValue[];
}

export interface ConflictRecord {
  id: string;
  attributeName: string;
  oldValue: string;
  newValue: string;
  oldTimestamp: Date;
  newTimestamp: Date;
  oldSourceUnitId: string;
  newSourceUnitId: string;
  resolutionStrategy: ResolutionStrategy;
  outcome: ConflictOutcome;
  detectedAt: Date;
}

export interface ImplicitTrait {
  traitType: TraitType;
  description: string;
  strength: number;
  /** Ids of the memory units supporting the trait. */
  evidence: string[];
  lastUpdated: Date;
}

export interface UserProfile {
  userId: string;
  explicitAttributes: Record<string, ProfileAttribute>;
  implicitTraits: ImplicitTrait[];
  conflictHistory: ConflictRecord[];
  sourceClusterIds: string[];
  updatedAt: Date;
}

export interface ProfileAnalysis {
  explicitFacts: Array<{ attributeName: string; value: string; confidence: number }>;
  implicitTraits: Array<{ traitType: TraitType; description: string; strength: number }>;
}

export interface SufficiencyVerdict {
  sufficient: boolean;
  rationale: string;
  missingInfo: string[];
}

export interface RankedUnit {
  unit: MemoryUnit;
  fusedScore: number;
  denseRank: number | null;
  sparseRank: number | null;
}

export interface RetrievedUnit extends RankedUnit {
  validForesights: Foresight[];
}

export interface SelectedCluster {
  cluster: ThematicCluster;
  score: number;
}

export type RecallState = "searching" | "evaluating" | "reformulating" | "done";

export interface RecallOutcome {
  question: string;
  referenceTime: Date;
  /** Number of search cycles run. */
  iterations: number;
  queriesUsed: string[];
  results: RetrievedUnit[];
  context: string;
  sufficient: boolean;
  rationale: string;
  transitions: RecallState[];
}

export interface RecallResult extends RecallOutcome {
  clusters: SelectedCluster[];
  profileAttributes: ProfileAttribute[];
}

export type IngestResult =
  | {
      ok: true;
      units: MemoryUnit[];
      newClusters: number;
      updatedClusters: number;
      conflicts: ConflictRecord[];
    }
  | {
      ok: false;
      reason: "no_memory_units";
      error?: Error;
    };

// External collaborators

export interface ExtractionService {
  extract(turns: ConversationTurn[], referenceTime: Date): Promise<MemoryUnitDraft[]>;
}

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
  readonly dimensions: number;
}

export interface VectorPayload {
  userId: string;
  clusterId: string | null;
  createdAt: string;
}

export interface VectorIndex {
  upsert(id: string, vector: readonly number[], payload: VectorPayload): Promise<void>;
  /** Ids ranked by descending cosine similarity, restricted to `userId`. */
  search(userId: string, vector: readonly number[], topK: number): Promise<string[]>;
  clear(userId: string): Promise<void>;
}

export interface LexicalIndex {
  index(userId: string, id: string, text: string): Promise<void>;
  search(userId: string, text: string, topK: number): Promise<string[]>;
  clear(userId: string): Promise<void>;
}

export interface GenerationService {
  judgeSufficiency(context: string, question: string): Promise<SufficiencyVerdict>;
  reformulate(question: string, rationale: string, previousQueries: string[]): Promise<string[]>;
  answer(context: string, question: string): Promise<string>;
}

export interface ProfileAnalyzer {
  analyze(unit: MemoryUnit): Promise<ProfileAnalysis>;
}

export interface ClusterDescriber {
  describeTheme(narratives: string[]): Promise<string>;
  updateSummary(summary: string, narrative: string): Promise<string>;
}
