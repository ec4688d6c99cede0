import { randomUUID } from "node:crypto";
import { assignToCluster } from "./clustering.js";
import { selectClusters } from "./context.js";
import { EmbeddingError, MemoryError, errorMessage } from "./errors.js";
import { buildExport, writeExportFile, type ExportOptions, type MemoryExportV1 } from "./export.js";
import { NO_CONTEXT_ANSWER } from "./generation.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { Bm25Index } from "./lexical-index.js";
import { log } from "./logger.js";
import {
  createProfile,
  liveAttributes,
  mergeTraits,
  renderProfileSummary,
  resolveProfileFacts,
  supersededValues,
} from "./profile.js";
import { RecallLoop } from "./recall.js";
import type { MemoryStore, StoreStats } from "./storage.js";
import { resolveForesightWindow } from "./temporal.js";
import type {
  ClusterDescriber,
  ConflictRecord,
  ConversationTurn,
  EmbeddingService,
  EngineConfig,
  ExtractionService,
  Foresight,
  GenerationService,
  IngestResult,
  LexicalIndex,
  MemoryUnit,
  MemoryUnitDraft,
  ProfileAnalysis,
  ProfileAnalyzer,
  ProfileAttribute,
  RecallResult,
  RetrievedUnit,
  ThematicCluster,
  UserProfile,
  VectorIndex,
} from "./types.js";
import { SqliteVectorIndex } from "./vector-index.js";

const THEME_FALLBACK_WORDS = 5;

export interface OrchestratorDeps {
  store: MemoryStore;
  extraction: ExtractionService;
  embedding: EmbeddingService;
  generation: GenerationService;
  profileAnalyzer: ProfileAnalyzer;
  clusterDescriber: ClusterDescriber;
  /** Defaults to cosine search over the store's own database. */
  vectorIndex?: VectorIndex;
  /** Defaults to an in-process BM25 index, rebuilt from the store by initialize(). */
  lexicalIndex?: LexicalIndex;
}

export interface AnswerResult {
  answer: string;
  recall: RecallResult;
}

export interface ClusterContents {
  cluster: ThematicCluster;
  units: MemoryUnit[];
}

/** Text embedded for dense search. */
export function embeddingText(unit: Pick<MemoryUnit, "narrative" | "atomicFacts" | "foresights">): string {
  return [unit.narrative, ...unit.atomicFacts, ...unit.foresights.map((f) => f.content)].join("\n");
}

/** Text indexed for lexical search: the unit's facts and foresight statements. */
export function lexicalText(unit: Pick<MemoryUnit, "atomicFacts" | "foresights">): string {
  return [...unit.atomicFacts, ...unit.foresights.map((f) => f.content)].join("\n");
}

const EMPTY_ANALYSIS: ProfileAnalysis = { explicitFacts: [], implicitTraits: [] };

export class Orchestrator {
  readonly store: MemoryStore;
  private readonly extraction: ExtractionService;
  private readonly embedding: EmbeddingService;
  private readonly generation: GenerationService;
  private readonly profileAnalyzer: ProfileAnalyzer;
  private readonly clusterDescriber: ClusterDescriber;
  private readonly vectorIndex: VectorIndex;
  private readonly lexicalIndex: LexicalIndex;
  private readonly recallLoop: RecallLoop;
  // Profile and cluster mutation is serialized per user.
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly config: EngineConfig,
    deps: OrchestratorDeps,
  ) {
    this.store = deps.store;
    this.extraction = deps.extraction;
    this.embedding = deps.embedding;
    this.generation = deps.generation;
    this.profileAnalyzer = deps.profileAnalyzer;
    this.clusterDescriber = deps.clusterDescriber;
    this.vectorIndex = deps.vectorIndex ?? new SqliteVectorIndex(deps.store.db);
    this.lexicalIndex = deps.lexicalIndex ?? new Bm25Index();
    this.recallLoop = new RecallLoop(
      {
        units: this.store,
        embedding: this.embedding,
        vectorIndex: this.vectorIndex,
        lexicalIndex: this.lexicalIndex,
        generation: this.generation,
      },
      {
        rrfK: config.rrfK,
        searchTopK: config.searchTopK,
        maxContextUnits: config.maxContextUnits,
        maxRetries: config.maxQueryRewrites,
        timeoutMs: config.recallTimeoutMs,
      },
    );
  }

  /** Rebuild the search indexes for every user held in the store. */
  async initialize(): Promise<void> {
    const userIds = this.store.listUserIds();
    for (const userId of userIds) {
      await this.refreshIndices(userId);
    }
    log.info(`initialized: ${userIds.length} user(s) indexed`);
  }

  close(): void {
    this.store.close();
  }

  // ---------------------------------------------------------------------------
  // Ingestion
  // ---------------------------------------------------------------------------

  /**
   * Consolidate a conversation into memory. Extraction, embedding and profile
   * analysis run first; the per-user critical section then assigns clusters,
   * resolves profile conflicts and commits everything in one transaction.
   * Nothing is written when extraction or embedding fails.
   */
  async ingest(
    userId: string,
    turns: ConversationTurn[],
    referenceTime: Date = new Date(),
  ): Promise<IngestResult> {
    let drafts: MemoryUnitDraft[];
    try {
      drafts = await this.extraction.extract(turns, referenceTime);
    } catch (err) {
      log.warn(`ingest ${userId}: extraction failed: ${errorMessage(err)}`);
      return { ok: false, reason: "no_memory_units", error: err instanceof Error ? err : new Error(String(err)) };
    }
    if (drafts.length === 0) {
      log.debug(`ingest ${userId}: extraction produced no memory units`);
      return { ok: false, reason: "no_memory_units" };
    }

    const units = drafts.map((d) => this.buildUnit(userId, d, referenceTime));

    try {
      await Promise.all(
        units.map(async (unit) => {
          unit.embedding = await this.embedding.embed(embeddingText(unit));
        }),
      );
    } catch (err) {
      const error =
        err instanceof MemoryError ? err : new EmbeddingError(`embedding failed: ${errorMessage(err)}`, { cause: err });
      log.warn(`ingest ${userId}: ${error.message}; nothing stored`);
      return { ok: false, reason: "no_memory_units", error };
    }

    const analyses = await Promise.all(units.map((u) => this.analyzeProfile(u)));

    return this.mutex.runExclusive(userId, () => this.commit(userId, units, analyses));
  }

  private buildUnit(userId: string, draft: MemoryUnitDraft, referenceTime: Date): MemoryUnit {
    const foresights: Foresight[] = [];
    for (const candidate of draft.foresightCandidates) {
      const foresight = resolveForesightWindow(candidate, referenceTime, {
        ongoingDays: this.config.ongoingForesightDays,
      });
      if (foresight) foresights.push(foresight);
    }
    return {
      id: randomUUID(),
      userId,
      narrative: draft.narrative,
      atomicFacts: [...draft.atomicFacts],
      foresights,
      createdAt: referenceTime,
      clusterId: null,
      embedding: [],
    };
  }

  private async analyzeProfile(unit: MemoryUnit): Promise<ProfileAnalysis> {
    try {
      return await this.profileAnalyzer.analyze(unit);
    } catch (err) {
      log.warn(`profile analysis failed for unit ${unit.id}: ${errorMessage(err)}`);
      return EMPTY_ANALYSIS;
    }
  }

  private async commit(
    userId: string,
    units: MemoryUnit[],
    analyses: ProfileAnalysis[],
  ): Promise<IngestResult> {
    const now = new Date();
    const clusters = this.store.listClusters(userId);
    const profile = this.store.loadProfile(userId) ?? createProfile(userId, now);
    const touched = new Map<string, ThematicCluster>();
    const created = new Set<string>();

    for (const unit of units) {
      const assignment = assignToCluster(unit, clusters, this.config.clusterSimilarityThreshold, now);
      const { cluster } = assignment;
      touched.set(cluster.id, cluster);
      if (assignment.created) {
        created.add(cluster.id);
        cluster.themeLabel = await this.describeTheme(unit.narrative);
      } else {
        cluster.summary = await this.updateSummary(cluster.summary, unit.narrative);
      }
      log.debug(
        `unit ${unit.id} -> cluster ${cluster.id} (${assignment.created ? "new" : "joined"}, sim=${assignment.similarity.toFixed(3)})`,
      );
    }

    const conflicts: ConflictRecord[] = [];
    units.forEach((unit, i) => {
      const analysis = analyses[i] ?? EMPTY_ANALYSIS;
      const facts: ProfileAttribute[] = analysis.explicitFacts.map((f) => ({
        attributeName: f.attributeName,
        value: f.value,
        timestamp: unit.createdAt,
        sourceUnitId: unit.id,
        confidence: f.confidence,
      }));
      conflicts.push(...resolveProfileFacts(profile, facts, now));
      mergeTraits(profile, analysis.implicitTraits, unit.id, now);
      if (
        (facts.length > 0 || analysis.implicitTraits.length > 0) &&
        unit.clusterId !== null &&
        !profile.sourceClusterIds.includes(unit.clusterId)
      ) {
        profile.sourceClusterIds.push(unit.clusterId);
      }
    });

    this.store.saveBatch({ units, clusters: [...touched.values()], profile, newConflicts: conflicts });

    await this.indexUnits(userId, units);

    const updatedClusters = [...touched.keys()].filter((id) => !created.has(id)).length;
    log.info(
      `ingest ${userId}: ${units.length} unit(s), ${created.size} new cluster(s), ${updatedClusters} updated, ${conflicts.length} conflict(s)`,
    );
    return { ok: true, units, newClusters: created.size, updatedClusters, conflicts };
  }

  private async describeTheme(narrative: string): Promise<string> {
    try {
      return await this.clusterDescriber.describeTheme([narrative]);
    } catch (err) {
      log.debug(`theme labelling failed, using narrative: ${errorMessage(err)}`);
      return narrative.trim().split(/\s+/).slice(0, THEME_FALLBACK_WORDS).join(" ");
    }
  }

  private async updateSummary(summary: string, narrative: string): Promise<string> {
    try {
      return await this.clusterDescriber.updateSummary(summary, narrative);
    } catch (err) {
      log.debug(`summary update failed, appending narrative: ${errorMessage(err)}`);
      return summary ? `${summary}\n${narrative}` : narrative;
    }
  }

  private async indexUnits(userId: string, units: readonly MemoryUnit[]): Promise<void> {
    for (const unit of units) {
      await this.vectorIndex.upsert(unit.id, unit.embedding, {
        userId,
        clusterId: unit.clusterId,
        createdAt: unit.createdAt.toISOString(),
      });
      await this.lexicalIndex.index(userId, unit.id, lexicalText(unit));
    }
  }

  /** Drop and rebuild both search indexes for `userId` from the store. */
  async refreshIndices(userId: string): Promise<number> {
    return this.mutex.runExclusive(userId, async () => {
      const units = this.store.listUnits(userId);
      await this.vectorIndex.clear(userId);
      await this.lexicalIndex.clear(userId);
      await this.indexUnits(userId, units);
      log.debug(`refreshed indexes for ${userId}: ${units.length} unit(s)`);
      return units.length;
    });
  }

  // ---------------------------------------------------------------------------
  // Retrieval
  // ---------------------------------------------------------------------------

  /**
   * Reconstructive recall: the retrieve/evaluate/reformulate loop plus the
   * user's live profile and the clusters the results fall into.
   */
  async recall(userId: string, question: string, referenceTime: Date = new Date()): Promise<RecallResult> {
    const profile = this.store.loadProfile(userId);
    const profileAttributes = profile ? liveAttributes(profile) : [];
    const superseded = profile ? supersededValues(profile) : [];
    const outcome = await this.recallLoop.run(userId, question, referenceTime, {
      attributes: profileAttributes,
      superseded,
    });
    const clusters = selectClusters(
      outcome.results,
      this.store.listClusters(userId),
      this.config.clusterSelectionTopK,
    );
    return { ...outcome, clusters, profileAttributes };
  }

  /** Single search cycle without the sufficiency loop. */
  async search(userId: string, query: string, referenceTime: Date = new Date()): Promise<RetrievedUnit[]> {
    return this.recallLoop.search(userId, query, referenceTime);
  }

  async answer(userId: string, question: string, referenceTime: Date = new Date()): Promise<AnswerResult> {
    const recall = await this.recall(userId, question, referenceTime);
    if (recall.context.length === 0) return { answer: NO_CONTEXT_ANSWER, recall };
    const answer = await this.generation.answer(recall.context, question);
    return { answer, recall };
  }

  // ---------------------------------------------------------------------------
  // Inspection and maintenance
  // ---------------------------------------------------------------------------

  getProfile(userId: string): UserProfile | null {
    return this.store.loadProfile(userId);
  }

  profileSummary(userId: string): string {
    const profile = this.store.loadProfile(userId);
    return profile ? renderProfileSummary(profile) : `No profile for ${userId}`;
  }

  getClusterContents(clusterId: string): ClusterContents | null {
    const cluster = this.store.getCluster(clusterId);
    if (!cluster) return null;
    return { cluster, units: this.store.getUnits(cluster.memberIds) };
  }

  stats(userId: string): StoreStats {
    return this.store.stats(userId);
  }

  async exportMemory(
    userId: string,
    options: ExportOptions & { outFile?: string } = {},
  ): Promise<MemoryExportV1> {
    const data = buildExport(
      userId,
      {
        units: this.store.listUnits(userId),
        clusters: this.store.listClusters(userId),
        profile: this.store.loadProfile(userId),
      },
      options,
    );
    if (options.outFile) {
      await writeExportFile(options.outFile, data);
      log.info(`exported memory for ${userId} to ${options.outFile}`);
    }
    return data;
  }

  /** Irreversibly deletes everything held for `userId`. Requires `{ confirm: true }`. */
  async clearMemory(userId: string, options: { confirm: boolean }): Promise<StoreStats> {
    if (options.confirm !== true) {
      throw new Error("clearMemory requires { confirm: true }");
    }
    return this.mutex.runExclusive(userId, async () => {
      const before = this.store.stats(userId);
      this.store.clearUser(userId);
      await this.vectorIndex.clear(userId);
      await this.lexicalIndex.clear(userId);
      log.info(`cleared memory for ${userId}: ${before.units} unit(s), ${before.clusters} cluster(s)`);
      return before;
    });
  }
}
