import type OpenAI from "openai";
import { EmbeddingError, errorMessage } from "./errors.js";
import { createOpenAiClient, isRetryableApiError } from "./llm.js";
import { log } from "./logger.js";
import { callWithRetry } from "./retry.js";
import type { EmbeddingService, EngineConfig } from "./types.js";

export type EmbeddingConfig = Pick<
  EngineConfig,
  "openaiApiKey" | "openaiBaseUrl" | "embeddingModel" | "embeddingDimensions" | "llmTimeoutMs"
>;

export class OpenAiEmbeddingService implements EmbeddingService {
  private readonly client: OpenAI | null;
  readonly dimensions: number;

  constructor(
    private readonly config: EmbeddingConfig,
    client?: OpenAI | null,
  ) {
    this.client = client === undefined ? createOpenAiClient(config) : client;
    this.dimensions = config.embeddingDimensions;
  }

  async embed(text: string): Promise<number[]> {
    const client = this.client;
    if (!client) throw new EmbeddingError("no OpenAI API key configured for embeddings");

    const input = text.trim();
    if (input.length === 0) throw new EmbeddingError("cannot embed empty text");

    let vector: number[];
    try {
      const response = await callWithRetry(
        () =>
          client.embeddings.create({
            model: this.config.embeddingModel,
            input,
            dimensions: this.dimensions,
          }),
        isRetryableApiError,
        { operation: "embedding" },
      );
      const first = response.data[0];
      if (!first) throw new Error("empty embedding response");
      vector = first.embedding;
    } catch (err) {
      log.debug(`embedding failed: ${errorMessage(err)}`);
      throw new EmbeddingError(`embedding failed: ${errorMessage(err)}`, { cause: err });
    }

    if (vector.length !== this.dimensions) {
      throw new EmbeddingError(
        `embedding has ${vector.length} dimensions, expected ${this.dimensions}`,
      );
    }
    return vector;
  }
}
