import { parseConfig } from "./config.js";
import { OpenAiEmbeddingService } from "./embedding.js";
import { ExtractionEngine } from "./extraction.js";
import { GenerationEngine } from "./generation.js";
import { LlmClient } from "./llm.js";
import { initLogger, type LogSink } from "./logger.js";
import { Orchestrator } from "./orchestrator.js";
import { MemoryStore } from "./storage.js";

export interface CreateEngineOptions {
  /** Where log lines go; defaults to the console. */
  logger?: LogSink;
}

/**
 * Build a ready-to-use engine from a loose config object: OpenAI-backed
 * extraction, embedding and generation over a SQLite store, with search
 * indexes rebuilt from what the store already holds.
 */
export async function createMemoryEngine(
  rawConfig: unknown = {},
  options: CreateEngineOptions = {},
): Promise<Orchestrator> {
  const config = parseConfig(rawConfig);
  initLogger(options.logger ?? console, config.debug);

  const llm = new LlmClient(config);
  const engine = new ExtractionEngine(llm);
  const orchestrator = new Orchestrator(config, {
    store: new MemoryStore(config.databasePath),
    extraction: engine,
    profileAnalyzer: engine,
    clusterDescriber: engine,
    embedding: new OpenAiEmbeddingService(config),
    generation: new GenerationEngine(llm),
  });
  await orchestrator.initialize();
  return orchestrator;
}

export { parseConfig } from "./config.js";
export { Orchestrator } from "./orchestrator.js";
export type { AnswerResult, ClusterContents, OrchestratorDeps } from "./orchestrator.js";
export { MemoryStore } from "./storage.js";
export type { StoreStats } from "./storage.js";
export { RecallLoop } from "./recall.js";
export { Bm25Index } from "./lexical-index.js";
export { SqliteVectorIndex } from "./vector-index.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { LlmClient } from "./llm.js";
export { ExtractionEngine } from "./extraction.js";
export { GenerationEngine } from "./generation.js";
export { OpenAiEmbeddingService } from "./embedding.js";
export { assignToCluster, nearestCluster } from "./clustering.js";
export {
  resolveProfileFacts,
  mergeTraits,
  liveAttributes,
  getAttribute,
  supersededValues,
  renderProfileSummary,
} from "./profile.js";
export { fuseRankings } from "./fusion.js";
export { isValidAt, filterByValidity, resolveForesightWindow } from "./temporal.js";
export { EMPTY_PROFILE_CONTEXT, renderContext, selectClusters } from "./context.js";
export type { MemoryExportV1 } from "./export.js";
export {
  MemoryError,
  ExtractionError,
  EmbeddingError,
  IndexUnavailableError,
  RecallTimeoutError,
  isRetrievalError,
} from "./errors.js";
export type { RetrievalError } from "./errors.js";
export { initLogger } from "./logger.js";
export type { LogSink } from "./logger.js";
export type * from "./types.js";
