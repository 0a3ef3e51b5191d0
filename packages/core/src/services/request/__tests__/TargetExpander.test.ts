import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { expandTargets } from "../TargetExpander.js";

test("a plain url is a single trimmed target", async () => {
  assert.deepEqual(await expandTargets("  https://api.test/items  "), ["https://api.test/items"]);
});

test("a file of urls fans out to its non-blank lines in order", async () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "reqdeck-targets-"));
  const file = path.join(dir, "urls.txt");
  writeFileSync(file, "https://a.test\n\n  https://b.test  \r\n\t\nhttps://c.test\n", "utf8");
  assert.deepEqual(await expandTargets(file), ["https://a.test", "https://b.test", "https://c.test"]);
});

test("a directory is not a target file", async () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), "reqdeck-targets-"));
  assert.deepEqual(await expandTargets(dir), [dir]);
});
