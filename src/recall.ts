import { EMPTY_PROFILE_CONTEXT, renderContext } from "./context.js";
import {
  EmbeddingError,
  IndexUnavailableError,
  MemoryError,
  RecallTimeoutError,
  errorMessage,
} from "./errors.js";
import { fuseRankings } from "./fusion.js";
import { log } from "./logger.js";
import { withTimeout } from "./retry.js";
import { filterByValidity } from "./temporal.js";
import { salientRephrasings } from "./tokenize.js";
import type {
  EmbeddingService,
  GenerationService,
  LexicalIndex,
  MemoryUnit,
  ProfileContext,
  RankedUnit,
  RecallOutcome,
  RecallState,
  RetrievedUnit,
  SufficiencyVerdict,
  VectorIndex,
} from "./types.js";

export interface UnitSource {
  getUnits(ids: readonly string[]): MemoryUnit[];
}

export interface RecallLoopDeps {
  units: UnitSource;
  embedding: EmbeddingService;
  vectorIndex: VectorIndex;
  lexicalIndex: LexicalIndex;
  generation: GenerationService;
}

export interface RecallLoopOptions {
  rrfK: number;
  /** Each index returns up to twice this many candidates. */
  searchTopK: number;
  maxContextUnits: number;
  maxRetries: number;
  timeoutMs: number;
}

const FAIL_OPEN_VERDICT: SufficiencyVerdict = {
  sufficient: true,
  rationale: "sufficiency judgment unavailable; using current context",
  missingInfo: [],
};

function normalizeQuery(q: string): string {
  return q.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Retrieve-evaluate-reformulate loop:
 *
 *   searching -> evaluating -> done
 *                           -> reformulating -> searching
 *
 * Runs at most `maxRetries + 1` search cycles. The latest cycle's results are
 * the ones returned.
 */
export class RecallLoop {
  constructor(
    private readonly deps: RecallLoopDeps,
    private readonly options: RecallLoopOptions,
  ) {}

  async run(
    userId: string,
    question: string,
    referenceTime: Date,
    profile: ProfileContext = EMPTY_PROFILE_CONTEXT,
  ): Promise<RecallOutcome> {
    return withTimeout(
      this.loop(userId, question, referenceTime, profile),
      this.options.timeoutMs,
      () => new RecallTimeoutError(this.options.timeoutMs),
    );
  }

  /**
   * One search cycle: concurrent dense and sparse search, rank fusion, then
   * the temporal filter. Either index failing fails the whole search.
   */
  async search(userId: string, query: string, referenceTime: Date): Promise<RetrievedUnit[]> {
    const queryVector = await this.embedQuery(query);
    const candidates = this.options.searchTopK * 2;

    const [dense, sparse] = await Promise.all([
      this.deps.vectorIndex.search(userId, queryVector, candidates).catch((err: unknown) => {
        throw new IndexUnavailableError("dense", `vector search failed: ${errorMessage(err)}`, { cause: err });
      }),
      this.deps.lexicalIndex.search(userId, query, candidates).catch((err: unknown) => {
        throw new IndexUnavailableError("sparse", `lexical search failed: ${errorMessage(err)}`, { cause: err });
      }),
    ]);

    const fused = fuseRankings(dense, sparse, this.options.rrfK);
    const units = new Map(this.deps.units.getUnits(fused.map((f) => f.id)).map((u) => [u.id, u]));

    const ranked: RankedUnit[] = [];
    for (const f of fused) {
      const unit = units.get(f.id);
      // Indexes are eventually consistent with the store; skip ids it no longer holds.
      if (!unit || unit.userId !== userId) continue;
      ranked.push({ unit, fusedScore: f.score, denseRank: f.denseRank, sparseRank: f.sparseRank });
    }

    const filtered = filterByValidity(ranked, referenceTime).slice(0, this.options.maxContextUnits);
    log.debug(
      `recall search: dense=${dense.length} sparse=${sparse.length} fused=${fused.length} kept=${filtered.length}`,
    );
    return filtered;
  }

  private async loop(
    userId: string,
    question: string,
    referenceTime: Date,
    profile: ProfileContext,
  ): Promise<RecallOutcome> {
    const transitions: RecallState[] = [];
    const queriesUsed = [question];
    let currentQuery = question;
    let retries = 0;
    let iterations = 0;
    let results: RetrievedUnit[] = [];
    let context = "";
    let verdict: SufficiencyVerdict = FAIL_OPEN_VERDICT;

    for (;;) {
      transitions.push("searching");
      iterations++;
      results = await this.search(userId, currentQuery, referenceTime);
      context = renderContext(profile, results);

      transitions.push("evaluating");
      verdict = await this.judge(context, question);
      if (verdict.sufficient || retries >= this.options.maxRetries) break;

      transitions.push("reformulating");
      retries++;
      const next = await this.nextQuery(question, verdict, queriesUsed);
      if (next === null) {
        log.debug("recall: no untried reformulation left, stopping");
        break;
      }
      queriesUsed.push(next);
      currentQuery = next;
    }

    transitions.push("done");
    log.debug(`recall: ${iterations} cycle(s), sufficient=${verdict.sufficient}, results=${results.length}`);

    return {
      question,
      referenceTime,
      iterations,
      queriesUsed,
      results,
      context,
      sufficient: verdict.sufficient,
      rationale: verdict.rationale,
      transitions,
    };
  }

  private async embedQuery(query: string): Promise<number[]> {
    try {
      return await this.deps.embedding.embed(query);
    } catch (err) {
      if (err instanceof MemoryError) throw err;
      throw new EmbeddingError(`query embedding failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Fails open: any error or malformed verdict counts as sufficient. */
  private async judge(context: string, question: string): Promise<SufficiencyVerdict> {
    try {
      const verdict: unknown = await this.deps.generation.judgeSufficiency(context, question);
      if (
        typeof verdict === "object" &&
        verdict !== null &&
        "sufficient" in verdict &&
        typeof verdict.sufficient === "boolean"
      ) {
        const rationale = "rationale" in verdict && typeof verdict.rationale === "string" ? verdict.rationale : "";
        const missingInfo =
          "missingInfo" in verdict && Array.isArray(verdict.missingInfo)
            ? verdict.missingInfo.filter((m): m is string => typeof m === "string")
            : [];
        return { sufficient: verdict.sufficient, rationale, missingInfo };
      }
      log.warn("recall: malformed sufficiency verdict, treating context as sufficient");
    } catch (err) {
      log.warn(`recall: sufficiency judgment failed (${errorMessage(err)}), treating context as sufficient`);
    }
    return FAIL_OPEN_VERDICT;
  }

  private async nextQuery(
    question: string,
    verdict: SufficiencyVerdict,
    tried: string[],
  ): Promise<string | null> {
    const triedSet = new Set(tried.map(normalizeQuery));
    const pick = (candidates: string[]): string | null => {
      for (const c of candidates) {
        const trimmed = typeof c === "string" ? c.trim() : "";
        if (trimmed && !triedSet.has(normalizeQuery(trimmed))) return trimmed;
      }
      return null;
    };

    const rationale =
      verdict.missingInfo.length > 0
        ? `${verdict.rationale}\nMissing: ${verdict.missingInfo.join("; ")}`
        : verdict.rationale;

    try {
      const alternatives = await this.deps.generation.reformulate(question, rationale, [...tried]);
      const next = pick(alternatives.slice(0, 3));
      if (next !== null) return next;
    } catch (err) {
      log.warn(`recall: reformulation failed (${errorMessage(err)}), using salient-token rephrasing`);
    }
    return pick(salientRephrasings(question));
  }
}
