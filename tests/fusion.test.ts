import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_RRF_K, fuseRankings } from "../src/fusion.js";

test("an id ranked first in both lists outscores one ranked first in only one", () => {
  const fused = fuseRankings(["a", "b"], ["a", "c"]);

  assert.equal(DEFAULT_RRF_K, 60);
  assert.equal(fused[0].id, "a");
  assert.equal(fused[0].score, 1 / 61 + 1 / 61);
  assert.ok(fused[0].score > 1 / 61);
  assert.deepEqual(
    fused.map((f) => [f.id, f.denseRank, f.sparseRank]),
    [
      ["a", 1, 1],
      ["b", 2, null],
      ["c", null, 2],
    ],
  );
});

test("equal scores fall back to the lower rank sum before the id", () => {
  // zeta: dense #1 (rank sum 1 + 2); alpha: sparse #1 (rank sum 4 + 1)
  const fused = fuseRankings(["zeta", "m1", "m2"], ["alpha"]);
  assert.equal(fused[0].score, fused[1].score);
  assert.deepEqual(fused.slice(0, 2).map((f) => f.id), ["zeta", "alpha"]);
});

test("identical score and rank sum order by id", () => {
  const fused = fuseRankings(["y", "x"], ["x", "y"]);
  assert.deepEqual(fused.map((f) => f.id), ["x", "y"]);
});

test("k changes the scores", () => {
  const fused = fuseRankings(["a"], [], 10);
  assert.equal(fused[0].score, 1 / 11);
});

test("duplicates keep their best position and empty inputs fuse to nothing", () => {
  const fused = fuseRankings(["a", "b", "a"], []);
  assert.deepEqual(fused.map((f) => [f.id, f.denseRank]), [
    ["a", 1],
    ["b", 2],
  ]);
  assert.deepEqual(fuseRankings([], []), []);
});
