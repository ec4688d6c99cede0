import test from "node:test";
import assert from "node:assert/strict";
import { EmbeddingError, IndexUnavailableError, RecallTimeoutError, isRetrievalError } from "../src/errors.js";
import { RecallLoop, type RecallLoopOptions } from "../src/recall.js";
import type { LexicalIndex, MemoryUnit, RecallState, VectorIndex } from "../src/types.js";
import { KeywordEmbedding, ScriptedGeneration, silenceLogs, unit } from "./engine-fixtures.js";

silenceLogs();

const REF = new Date("2025-07-01T00:00:00Z");
const QUESTION = "where did the user travel last summer";

const OPTIONS: RecallLoopOptions = {
  rrfK: 60,
  searchTopK: 10,
  maxContextUnits: 8,
  maxRetries: 3,
  timeoutMs: 5_000,
};

function staticIndexes(dense: string[], sparse: string[]): { vectorIndex: VectorIndex; lexicalIndex: LexicalIndex } {
  return {
    vectorIndex: {
      upsert: async () => {},
      search: async (_userId, _vector, topK) => dense.slice(0, topK),
      clear: async () => {},
    },
    lexicalIndex: {
      index: async () => {},
      search: async (_userId, _text, topK) => sparse.slice(0, topK),
      clear: async () => {},
    },
  };
}

function unitSource(units: MemoryUnit[]) {
  const byId = new Map(units.map((u) => [u.id, u]));
  return {
    getUnits: (ids: readonly string[]) =>
      ids.flatMap((id) => {
        const u = byId.get(id);
        return u ? [u] : [];
      }),
  };
}

const UNITS = ["u1", "u2", "u3"].map((id) => unit(id, { atomicFacts: [`fact about ${id}`] }));

const insufficient = async () => ({ sufficient: false, rationale: "missing the destination", missingInfo: ["destination"] });

test("a sufficient first search ends after one cycle", async () => {
  const generation = new ScriptedGeneration();
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1", "u2"], ["u2"]) },
    OPTIONS,
  );

  const outcome = await loop.run("user-1", QUESTION, REF);

  assert.equal(outcome.iterations, 1);
  assert.equal(outcome.sufficient, true);
  assert.deepEqual(outcome.transitions, ["searching", "evaluating", "done"]);
  assert.deepEqual(outcome.results.map((r) => r.unit.id), ["u2", "u1"]);
  assert.deepEqual(outcome.queriesUsed, [QUESTION]);
  assert.equal(generation.reformulateCalls, 0);
});

test("an always-insufficient judge stops after maxRetries + 1 cycles", async () => {
  let n = 0;
  const generation = new ScriptedGeneration({
    judge: insufficient,
    reformulate: async () => [`alternative ${++n}`],
  });
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1"], []) },
    OPTIONS,
  );

  const outcome = await loop.run("user-1", QUESTION, REF);

  const cycle: RecallState[] = ["searching", "evaluating", "reformulating"];
  assert.equal(outcome.iterations, 4);
  assert.equal(outcome.sufficient, false);
  assert.equal(outcome.rationale, "missing the destination");
  assert.deepEqual(outcome.transitions, [...cycle, ...cycle, ...cycle, "searching", "evaluating", "done"]);
  assert.deepEqual(outcome.queriesUsed, [QUESTION, "alternative 1", "alternative 2", "alternative 3"]);
  assert.equal(generation.judgeCalls, 4);
});

test("repeated alternatives fall back to salient-token rephrasings", async () => {
  const generation = new ScriptedGeneration({
    judge: insufficient,
    reformulate: async () => ["alt query"],
  });
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1"], []) },
    OPTIONS,
  );

  const outcome = await loop.run("user-1", QUESTION, REF);

  assert.deepEqual(outcome.queriesUsed, [QUESTION, "alt query", "user travel last", "user travel"]);
});

test("a failing reformulation also falls back, and the loop stops when nothing new is left", async () => {
  const generation = new ScriptedGeneration({
    judge: insufficient,
    reformulate: async () => {
      throw new Error("model unavailable");
    },
  });
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1"], []) },
    { ...OPTIONS, maxRetries: 10 },
  );

  const outcome = await loop.run("user-1", "travel plans", REF);

  // "travel plans" -> "travel", "plans", then nothing untried.
  assert.deepEqual(outcome.queriesUsed, ["travel plans", "travel", "plans"]);
  assert.equal(outcome.iterations, 3);
  assert.equal(outcome.transitions.at(-2), "reformulating");
  assert.equal(outcome.transitions.at(-1), "done");
});

test("a failing sufficiency judgment fails open", async () => {
  const generation = new ScriptedGeneration({
    judge: async () => {
      throw new Error("judge down");
    },
  });
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1"], []) },
    OPTIONS,
  );

  const outcome = await loop.run("user-1", QUESTION, REF);

  assert.equal(outcome.sufficient, true);
  assert.equal(outcome.iterations, 1);
  assert.deepEqual(outcome.results.map((r) => r.unit.id), ["u1"]);
});

test("an empty store yields a valid empty result", async () => {
  const loop = new RecallLoop(
    {
      units: unitSource([]),
      embedding: new KeywordEmbedding(),
      generation: new ScriptedGeneration(),
      ...staticIndexes([], []),
    },
    OPTIONS,
  );

  const outcome = await loop.run("user-1", QUESTION, REF);

  assert.deepEqual(outcome.results, []);
  assert.equal(outcome.context, "");
});

test("results are capped at maxContextUnits and ids missing from the store are skipped", async () => {
  const units = ["a", "b", "c", "d"].map((id) => unit(id, { atomicFacts: [`fact ${id}`] }));
  const loop = new RecallLoop(
    {
      units: unitSource(units),
      embedding: new KeywordEmbedding(),
      generation: new ScriptedGeneration(),
      ...staticIndexes(["ghost", "a", "b", "c", "d"], []),
    },
    { ...OPTIONS, maxContextUnits: 2 },
  );

  const results = await loop.search("user-1", QUESTION, REF);

  assert.deepEqual(results.map((r) => r.unit.id), ["a", "b"]);
  assert.equal(results[0].denseRank, 2);
  assert.equal(results[0].sparseRank, null);
});

test("a failing index surfaces as IndexUnavailableError naming the modality", async () => {
  const { vectorIndex, lexicalIndex } = staticIndexes(["u1"], ["u1"]);
  const brokenSparse: LexicalIndex = {
    ...lexicalIndex,
    search: async () => {
      throw new Error("index offline");
    },
  };
  const loop = new RecallLoop(
    {
      units: unitSource(UNITS),
      embedding: new KeywordEmbedding(),
      generation: new ScriptedGeneration(),
      vectorIndex,
      lexicalIndex: brokenSparse,
    },
    OPTIONS,
  );

  await assert.rejects(
    loop.run("user-1", QUESTION, REF),
    (err: unknown) => err instanceof IndexUnavailableError && err.modality === "sparse" && err.code === "index_unavailable",
  );
});

test("a failing vector index surfaces as a dense IndexUnavailableError", async () => {
  const { vectorIndex, lexicalIndex } = staticIndexes(["u1"], ["u1"]);
  const brokenDense: VectorIndex = {
    ...vectorIndex,
    search: async () => {
      throw new Error("vector store offline");
    },
  };
  const loop = new RecallLoop(
    {
      units: unitSource(UNITS),
      embedding: new KeywordEmbedding(),
      generation: new ScriptedGeneration(),
      vectorIndex: brokenDense,
      lexicalIndex,
    },
    OPTIONS,
  );

  await assert.rejects(
    loop.run("user-1", QUESTION, REF),
    (err: unknown) => err instanceof IndexUnavailableError && err.modality === "dense" && isRetrievalError(err),
  );
});

test("a failing query embedding surfaces as EmbeddingError without searching", async () => {
  const embedding = new KeywordEmbedding();
  embedding.failWith = new Error("embedding quota exhausted");
  let searched = 0;
  const { vectorIndex, lexicalIndex } = staticIndexes(["u1"], ["u1"]);
  const countingDense: VectorIndex = {
    ...vectorIndex,
    search: async (userId, vector, topK) => {
      searched++;
      return vectorIndex.search(userId, vector, topK);
    },
  };
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding, generation: new ScriptedGeneration(), vectorIndex: countingDense, lexicalIndex },
    OPTIONS,
  );

  await assert.rejects(
    loop.run("user-1", QUESTION, REF),
    (err: unknown) => err instanceof EmbeddingError && err.code === "embedding_failed" && isRetrievalError(err),
  );
  assert.equal(searched, 0);
});

test("recall that outlives its budget is rejected with RecallTimeoutError", async () => {
  const generation = new ScriptedGeneration({
    judge: () => new Promise<never>(() => {}),
  });
  const loop = new RecallLoop(
    { units: unitSource(UNITS), embedding: new KeywordEmbedding(), generation, ...staticIndexes(["u1"], []) },
    { ...OPTIONS, timeoutMs: 20 },
  );

  await assert.rejects(loop.run("user-1", QUESTION, REF), (err: unknown) => err instanceof RecallTimeoutError);
});
