import test from "node:test";
import assert from "node:assert/strict";
import { unifiedDiff } from "../LineDiff.js";

test("identical input has no diff", () => {
  assert.deepEqual(unifiedDiff(["a", "b"], ["a", "b"], "left", "right"), []);
});

test("a changed line shows as removal then addition with context", () => {
  assert.deepEqual(unifiedDiff(["a", "b", "c"], ["a", "x", "c"], "left", "right"), [
    "--- left",
    "+++ right",
    "@@ -1,3 +1,3 @@",
    " a",
    "-b",
    "+x",
    " c",
  ]);
});

test("distant changes become separate hunks", () => {
  const before = ["l1", "l2", "l3", "l4", "l5", "l6", "l7", "l8", "l9", "l10"];
  const after = ["L1", "l2", "l3", "l4", "l5", "l6", "l7", "l8", "l9", "L10"];
  assert.deepEqual(unifiedDiff(before, after, "a", "b"), [
    "--- a",
    "+++ b",
    "@@ -1,4 +1,4 @@",
    "-l1",
    "+L1",
    " l2",
    " l3",
    " l4",
    "@@ -7,4 +7,4 @@",
    " l7",
    " l8",
    " l9",
    "-l10",
    "+L10",
  ]);
});

test("additions to empty input use a zero range", () => {
  assert.deepEqual(unifiedDiff([], ["x"], "a", "b"), ["--- a", "+++ b", "@@ -0,0 +1 @@", "+x"]);
});
