import type { LlmClient } from "./llm.js";
import { log } from "./logger.js";
import { ReformulationSchema, SufficiencySchema } from "./schemas.js";
import type { GenerationService, SufficiencyVerdict } from "./types.js";

const MAX_ALTERNATIVES = 3;

export const NO_CONTEXT_ANSWER = "I don't have enough information in memory to answer that.";

/** Sufficiency judgment, query reformulation and grounded answering. */
export class GenerationEngine implements GenerationService {
  constructor(private readonly llm: LlmClient) {}

  async judgeSufficiency(context: string, question: string): Promise<SufficiencyVerdict> {
    if (context.trim().length === 0) {
      return { sufficient: false, rationale: "no memories retrieved", missingInfo: [question] };
    }

    const verdict = await this.llm.parse(
      "sufficiency",
      SufficiencySchema,
      "sufficiency_verdict",
      `You judge whether retrieved memories are enough to answer a question.
Answer sufficient=true only if the context directly supports an answer. Otherwise list the specific information that is missing.`,
      `Question: ${question}\n\nContext:\n${context}`,
    );
    log.debug(`sufficiency: ${verdict.sufficient ? "sufficient" : "insufficient"} (${verdict.rationale})`);
    return verdict;
  }

  async reformulate(question: string, rationale: string, previousQueries: string[]): Promise<string[]> {
    const result = await this.llm.parse(
      "reformulation",
      ReformulationSchema,
      "query_reformulation",
      `You write search queries over a personal memory store. The earlier queries did not find enough to answer the question.
Write 2-3 new queries that target the missing information from different angles. Do not repeat earlier queries.`,
      `Question: ${question}\n\nWhat is missing: ${rationale || "(unspecified)"}\n\nEarlier queries:\n${previousQueries
        .map((q) => `- ${q}`)
        .join("\n")}`,
    );
    return result.queries
      .map((q) => q.trim())
      .filter((q) => q.length > 0)
      .slice(0, MAX_ALTERNATIVES);
  }

  async answer(context: string, question: string): Promise<string> {
    if (context.trim().length === 0) return NO_CONTEXT_ANSWER;
    return this.llm.complete(
      "answer",
      `Answer the question using only the memories below. Prefer the current profile over older episodes when they disagree. If the memories do not contain the answer, say so.

${context}`,
      question,
    );
  }
}
