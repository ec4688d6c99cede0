import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { OpenAiEmbeddingService } from "../src/embedding.js";
import { EmbeddingError, ExtractionError, MemoryError } from "../src/errors.js";
import { ExtractionEngine, formatTranscript, toSnakeCase } from "../src/extraction.js";
import { GenerationEngine, NO_CONTEXT_ANSWER } from "../src/generation.js";
import { extractJsonCandidates, parseJsonWithSchema } from "../src/json-extract.js";
import { LlmClient } from "../src/llm.js";
import { SufficiencySchema } from "../src/schemas.js";
import { silenceLogs, testConfig } from "./engine-fixtures.js";

const lines = silenceLogs();

test("JSON is recovered from fenced and prose-wrapped model output", () => {
  const fenced = 'Here you go:\n```json\n{"sufficient": true, "rationale": "ok", "missingInfo": []}\n```';
  assert.deepEqual(parseJsonWithSchema(fenced, SufficiencySchema), {
    sufficient: true,
    rationale: "ok",
    missingInfo: [],
  });

  const twoBlocks = 'Example: {"sufficient": "maybe"}\nAnswer: {"sufficient": false, "rationale": "no date", "missingInfo": ["date"]}';
  assert.deepEqual(parseJsonWithSchema(twoBlocks, SufficiencySchema), {
    sufficient: false,
    rationale: "no date",
    missingInfo: ["date"],
  });

  assert.equal(parseJsonWithSchema("no json here", z.object({ a: z.number() })), null);
});

test("balanced-block scanning ignores braces inside strings", () => {
  assert.deepEqual(extractJsonCandidates('x {"a": "}"} y'), ['x {"a": "}"} y', '{"a": "}"}']);
});

test("attribute names normalise to snake_case", () => {
  assert.equal(toSnakeCase("Dietary Preference"), "dietary_preference");
  assert.equal(toSnakeCase("dietaryPreference"), "dietary_preference");
  assert.equal(toSnakeCase(" home-city "), "home_city");
  assert.equal(toSnakeCase("__"), "");
});

test("transcripts carry speaker and optional timestamp", () => {
  assert.equal(
    formatTranscript([
      { speaker: "user", text: "I moved to Porto.", timestamp: "2025-02-01T10:00:00Z" },
      { speaker: "assistant", text: "Noted." },
    ]),
    "[2025-02-01T10:00:00Z] [user] I moved to Porto.\n\n[assistant] Noted.",
  );
});

test("without an API key the LLM-backed services fail with typed errors", async () => {
  const llm = new LlmClient(testConfig(), null);
  assert.equal(llm.available, false);
  assert.ok(lines.some((l) => l.includes("no OpenAI API key")));

  const extraction = new ExtractionEngine(llm);
  await assert.rejects(
    extraction.extract([{ speaker: "user", text: "I am vegetarian." }], new Date("2025-01-15T00:00:00Z")),
    (err: unknown) => err instanceof ExtractionError && err.code === "extraction_failed",
  );
  assert.deepEqual(await extraction.extract([{ speaker: "user", text: "   " }], new Date()), []);

  const generation = new GenerationEngine(llm);
  await assert.rejects(
    generation.reformulate("where did the user travel", "no destination", []),
    (err: unknown) => err instanceof MemoryError && err.code === "llm_unavailable",
  );

  const embedding = new OpenAiEmbeddingService(testConfig({ embeddingDimensions: 8 }), null);
  assert.equal(embedding.dimensions, 8);
  await assert.rejects(embedding.embed("hello"), (err: unknown) => err instanceof EmbeddingError);
});

test("empty context short-circuits judgment and answering", async () => {
  const generation = new GenerationEngine(new LlmClient(testConfig(), null));
  assert.deepEqual(await generation.judgeSufficiency("  ", "what does the user eat"), {
    sufficient: false,
    rationale: "no memories retrieved",
    missingInfo: ["what does the user eat"],
  });
  assert.equal(await generation.answer("", "what does the user eat"), NO_CONTEXT_ANSWER);
});
