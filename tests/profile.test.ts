import test from "node:test";
import assert from "node:assert/strict";
import {
  createProfile,
  getAttribute,
  liveAttributes,
  mergeTraits,
  renderProfileSummary,
  resolveProfileFacts,
  supersededValues,
  traitsSimilar,
} from "../src/profile.js";
import type { ProfileAttribute } from "../src/types.js";
import { closeTo, silenceLogs } from "./engine-fixtures.js";

silenceLogs();

const JAN15 = new Date("2025-01-15T09:00:00Z");
const MAR20 = new Date("2025-03-20T09:00:00Z");
const DETECTED = new Date("2025-04-01T00:00:00Z");

function fact(value: string, timestamp: Date, sourceUnitId: string, attributeName = "diet"): ProfileAttribute {
  return { attributeName, value, timestamp, sourceUnitId, confidence: 0.9 };
}

test("newer diet fact overrides the older one and leaves a recency conflict record", () => {
  const profile = createProfile("user-1", JAN15);
  assert.deepEqual(resolveProfileFacts(profile, [fact("vegetarian", JAN15, "u1")], DETECTED), []);

  const conflicts = resolveProfileFacts(profile, [fact("pescatarian", MAR20, "u2")], DETECTED);

  assert.equal(conflicts.length, 1);
  assert.equal(conflicts[0].resolutionStrategy, "recency");
  assert.equal(conflicts[0].outcome, "override");
  assert.equal(conflicts[0].oldValue, "vegetarian");
  assert.equal(conflicts[0].newValue, "pescatarian");
  assert.equal(conflicts[0].oldSourceUnitId, "u1");
  assert.equal(conflicts[0].newSourceUnitId, "u2");
  assert.equal(profile.explicitAttributes.diet.value, "pescatarian");
  assert.equal(profile.conflictHistory.length, 1);
  assert.equal(profile.updatedAt, DETECTED);
});

test("an older fact arriving late is recorded but does not override", () => {
  const profile = createProfile("user-1");
  resolveProfileFacts(profile, [fact("pescatarian", MAR20, "u2")], DETECTED);

  const conflicts = resolveProfileFacts(profile, [fact("vegetarian", JAN15, "u1")], DETECTED);

  assert.equal(conflicts.length, 1);
  assert.equal(conflicts[0].outcome, "retain");
  assert.equal(profile.explicitAttributes.diet.value, "pescatarian");
});

test("equal timestamps go to the incoming fact", () => {
  const profile = createProfile("user-1");
  resolveProfileFacts(profile, [fact("vegetarian", JAN15, "u1")], DETECTED);
  const conflicts = resolveProfileFacts(profile, [fact("vegan", JAN15, "u2")], DETECTED);

  assert.equal(conflicts[0].outcome, "override");
  assert.equal(profile.explicitAttributes.diet.value, "vegan");
});

test("re-applying the same value is a no-op", () => {
  const profile = createProfile("user-1");
  resolveProfileFacts(profile, [fact("vegetarian", JAN15, "u1")], DETECTED);
  const conflicts = resolveProfileFacts(profile, [fact("vegetarian", MAR20, "u3")], DETECTED);

  assert.deepEqual(conflicts, []);
  assert.equal(profile.conflictHistory.length, 0);
  assert.equal(profile.explicitAttributes.diet.sourceUnitId, "u1");
  assert.equal(profile.explicitAttributes.diet.timestamp, JAN15);
});

test("a sequence of changes keeps an append-only history and the latest value", () => {
  const profile = createProfile("user-1");
  const t = (d: number) => new Date(Date.UTC(2025, 0, d));
  resolveProfileFacts(
    profile,
    [fact("Porto", t(1), "u1", "home_city"), fact("Lisbon", t(2), "u2", "home_city"), fact("Braga", t(3), "u3", "home_city")],
    DETECTED,
  );

  assert.deepEqual(
    profile.conflictHistory.map((c) => [c.oldValue, c.newValue, c.outcome]),
    [
      ["Porto", "Lisbon", "override"],
      ["Lisbon", "Braga", "override"],
    ],
  );
  assert.equal(profile.explicitAttributes.home_city.value, "Braga");
});

test("attribute names shadowing Object.prototype members are ordinary attributes", () => {
  const profile = createProfile("user-1");
  assert.deepEqual(resolveProfileFacts(profile, [fact("first", JAN15, "u1", "constructor")], DETECTED), []);

  const conflicts = resolveProfileFacts(
    profile,
    [fact("second", MAR20, "u2", "constructor"), fact("x", JAN15, "u3", "__proto__")],
    DETECTED,
  );

  assert.equal(conflicts.length, 1);
  assert.equal(conflicts[0].oldValue, "first");
  assert.equal(conflicts[0].outcome, "override");
  assert.deepEqual(
    liveAttributes(profile).map((a) => [a.attributeName, a.value]),
    [
      ["__proto__", "x"],
      ["constructor", "second"],
    ],
  );
  assert.equal(Object.getPrototypeOf(profile.explicitAttributes), Object.prototype);
  assert.equal(getAttribute(profile, "toString"), undefined);
});

test("superseded values name the losing side of each conflict until it is live again", () => {
  const profile = createProfile("user-1");
  resolveProfileFacts(profile, [fact("vegetarian", JAN15, "u1")], DETECTED);
  resolveProfileFacts(profile, [fact("pescatarian", MAR20, "u2")], DETECTED);
  resolveProfileFacts(profile, [fact("vegan", JAN15, "u3")], DETECTED);

  assert.deepEqual(supersededValues(profile), [
    { attributeName: "diet", value: "vegetarian", unitId: "u1" },
    { attributeName: "diet", value: "vegan", unitId: "u3" },
  ]);

  resolveProfileFacts(profile, [fact("vegetarian", new Date("2025-05-01T00:00:00Z"), "u4")], DETECTED);

  assert.deepEqual(
    supersededValues(profile).map((s) => [s.value, s.unitId]),
    [
      ["vegan", "u3"],
      ["pescatarian", "u2"],
    ],
  );
});

test("similar traits of the same type merge; different types stay apart", () => {
  assert.equal(
    traitsSimilar(
      { traitType: "habit", description: "likes early morning runs" },
      { traitType: "habit", description: "likes early morning runs outdoors" },
    ),
    true,
  );
  assert.equal(
    traitsSimilar(
      { traitType: "habit", description: "likes early morning runs" },
      { traitType: "preference", description: "likes early morning runs" },
    ),
    false,
  );

  const profile = createProfile("user-1");
  mergeTraits(profile, [{ traitType: "habit", description: "likes early morning runs", strength: 0.6 }], "u1", DETECTED);
  mergeTraits(
    profile,
    [{ traitType: "habit", description: "likes early morning runs outdoors", strength: 0.8 }],
    "u2",
    DETECTED,
  );

  assert.equal(profile.implicitTraits.length, 1);
  assert.ok(closeTo(profile.implicitTraits[0].strength, 0.7));
  assert.deepEqual(profile.implicitTraits[0].evidence, ["u1", "u2"]);
});

test("live attributes are sorted by name and the summary lists them", () => {
  const profile = createProfile("user-1");
  resolveProfileFacts(
    profile,
    [fact("Lisbon", JAN15, "u1", "home_city"), fact("vegetarian", JAN15, "u1"), fact("pescatarian", MAR20, "u2")],
    DETECTED,
  );

  assert.deepEqual(liveAttributes(profile).map((a) => a.attributeName), ["diet", "home_city"]);
  assert.equal(
    renderProfileSummary(profile),
    [
      "User Profile (user-1)",
      "",
      "## Explicit attributes",
      "- diet: pescatarian",
      "- home_city: Lisbon",
      "",
      "## Implicit traits",
      "- (none)",
      "",
      "## Conflict history",
      "- diet: vegetarian -> pescatarian (recency, override)",
    ].join("\n"),
  );
});
