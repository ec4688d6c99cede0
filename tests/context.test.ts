import test from "node:test";
import assert from "node:assert/strict";
import { EMPTY_PROFILE_CONTEXT, renderContext } from "../src/context.js";
import type { MemoryUnit, ProfileContext, RetrievedUnit } from "../src/types.js";
import { foresight, unit } from "./engine-fixtures.js";

function retrieved(u: MemoryUnit): RetrievedUnit {
  return { unit: u, fusedScore: 0.01, denseRank: 1, sparseRank: null, validForesights: u.foresights };
}

const VEGETARIAN = unit("u1", {
  narrative: "The user said they are vegetarian.",
  atomicFacts: ["The user is vegetarian.", "The user cooks at home."],
});
const PESCATARIAN = unit("u2", {
  narrative: "The user switched to a pescatarian diet.",
  atomicFacts: ["The user is pescatarian."],
});

const DIET: ProfileContext = {
  attributes: [
    {
      attributeName: "diet",
      value: "pescatarian",
      timestamp: new Date("2025-03-20T10:00:00Z"),
      sourceUnitId: "u2",
      confidence: 0.9,
    },
  ],
  superseded: [{ attributeName: "diet", value: "vegetarian", unitId: "u1" }],
};

test("episodes render narrative, foresights and facts in order", () => {
  const u = unit("u3", {
    narrative: "The user booked a trip.",
    atomicFacts: ["The trip is in May."],
    foresights: [foresight("The user will be travelling", new Date("2025-05-01T00:00:00Z"), null)],
  });

  assert.equal(
    renderContext(EMPTY_PROFILE_CONTEXT, [retrieved(u)]),
    "[Episode 1]\nThe user booked a trip.\n\nActive Foresights:\n  - The user will be travelling\n\nKey Facts:\n  - The trip is in May.",
  );
  assert.equal(renderContext(EMPTY_PROFILE_CONTEXT, []), "");
});

test("lines stating a superseded value are left out of that unit only", () => {
  const context = renderContext(DIET, [retrieved(VEGETARIAN), retrieved(PESCATARIAN)]);

  assert.equal(
    context,
    [
      "[Current Profile]\n- diet: pescatarian (as of 2025-03-20)",
      "[Episode 1]\nKey Facts:\n  - The user cooks at home.",
      "[Episode 2]\nThe user switched to a pescatarian diet.\n\nKey Facts:\n  - The user is pescatarian.",
    ].join("\n\n---\n\n"),
  );
});

test("a unit with nothing current left is skipped and numbering stays contiguous", () => {
  const onlyStale = unit("u1", {
    narrative: "The user said they are Vegetarian.",
    atomicFacts: ["The user is vegetarian."],
  });

  const context = renderContext(DIET, [retrieved(onlyStale), retrieved(PESCATARIAN)]);

  assert.equal(context.includes("egetarian"), false);
  assert.equal(context.split("\n\n---\n\n")[1], "[Episode 1]\nThe user switched to a pescatarian diet.\n\nKey Facts:\n  - The user is pescatarian.");
});

test("stale values match whole words only", () => {
  const u = unit("u1", { narrative: "The user is a non vegetarians club member.", atomicFacts: [] });
  assert.equal(
    renderContext({ attributes: [], superseded: DIET.superseded }, [retrieved(u)]),
    "[Episode 1]\nThe user is a non vegetarians club member.",
  );
});
