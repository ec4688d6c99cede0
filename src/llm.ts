import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { MemoryError } from "./errors.js";
import { parseJsonWithSchema } from "./json-extract.js";
import { log } from "./logger.js";
import { callWithRetry } from "./retry.js";
import type { EngineConfig } from "./types.js";

export type LlmConfig = Pick<
  EngineConfig,
  "openaiApiKey" | "openaiBaseUrl" | "model" | "reasoningEffort" | "llmTimeoutMs"
>;

/** Rate limits, dropped connections and 5xx responses are worth another attempt. */
export function isRetryableApiError(err: unknown): boolean {
  return (
    err instanceof OpenAI.RateLimitError ||
    err instanceof OpenAI.APIConnectionError ||
    err instanceof OpenAI.InternalServerError
  );
}

export function createOpenAiClient(config: Pick<EngineConfig, "openaiApiKey" | "openaiBaseUrl" | "llmTimeoutMs">): OpenAI | null {
  if (!config.openaiApiKey) return null;
  return new OpenAI({
    apiKey: config.openaiApiKey,
    ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    timeout: config.llmTimeoutMs,
    // Retries go through callWithRetry so they show up in debug logs.
    maxRetries: 0,
  });
}

/**
 * Thin wrapper over the Responses API: structured parsing against a zod
 * schema, and plain text completion.
 */
export class LlmClient {
  private readonly client: OpenAI | null;

  constructor(
    private readonly config: LlmConfig,
    client?: OpenAI | null,
  ) {
    this.client = client === undefined ? createOpenAiClient(config) : client;
    if (!this.client) {
      log.warn("no OpenAI API key; extraction, profile analysis and answering are disabled");
    }
  }

  get available(): boolean {
    return this.client !== null;
  }

  private reasoningParam(): { reasoning?: { effort: "low" | "medium" | "high" } } {
    const effort = this.config.reasoningEffort;
    return effort === "none" ? {} : { reasoning: { effort } };
  }

  private requireClient(operation: string): OpenAI {
    if (!this.client) {
      throw new MemoryError("llm_unavailable", `${operation}: no OpenAI API key configured`);
    }
    return this.client;
  }

  async parse<T>(
    operation: string,
    schema: z.ZodType<T>,
    schemaName: string,
    instructions: string,
    input: string,
  ): Promise<T> {
    const client = this.requireClient(operation);
    const startedAt = Date.now();

    const response = await callWithRetry(
      () =>
        client.responses.parse({
          model: this.config.model,
          ...this.reasoningParam(),
          instructions,
          input,
          text: { format: zodTextFormat(schema, schemaName) },
        }),
      isRetryableApiError,
      { operation },
    );

    log.debug(`${operation}: completed in ${Date.now() - startedAt}ms`);

    const parsed = schema.safeParse(response.output_parsed);
    if (parsed.success) return parsed.data;

    // Some OpenAI-compatible endpoints ignore the response format and answer in prose.
    const recovered = parseJsonWithSchema(response.output_text, schema);
    if (recovered !== null) {
      log.debug(`${operation}: recovered JSON from unstructured output`);
      return recovered;
    }
    throw new Error(`${operation}: model returned no parseable output`);
  }

  async complete(operation: string, instructions: string, input: string): Promise<string> {
    const client = this.requireClient(operation);
    const response = await callWithRetry(
      () =>
        client.responses.create({
          model: this.config.model,
          ...this.reasoningParam(),
          instructions,
          input,
        }),
      isRetryableApiError,
      { operation },
    );
    return response.output_text.trim();
  }
}
