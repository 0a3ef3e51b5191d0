import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigLoader } from "../ConfigLoader.js";

const tempHome = (): string => mkdtempSync(path.join(os.tmpdir(), "reqdeck-config-"));

test("uses defaults when nothing is configured", async () => {
  const dataDir = tempHome();
  const config = await ConfigLoader.load({ env: { REQDECK_HOME: dataDir } });
  assert.deepEqual(config, {
    dataDir: path.resolve(dataDir),
    debug: false,
    timeoutMs: 30_000,
    scripts: { command: process.execPath, extension: "js" },
    logging: { runLogs: false },
  });
});

test("layers config file, environment and cli flags", async () => {
  const dataDir = tempHome();
  writeFileSync(
    path.join(dataDir, "config.json"),
    JSON.stringify({ debug: true, timeoutMs: 5000, scripts: { command: "python3", extension: "py" } }),
    "utf8",
  );
  const config = await ConfigLoader.load({
    dataDir,
    env: { REQDECK_TIMEOUT_MS: "7000", REQDECK_RUN_LOGS: "yes" },
    cli: { debug: false },
  });
  assert.equal(config.debug, false);
  assert.equal(config.timeoutMs, 7000);
  assert.deepEqual(config.scripts, { command: "python3", extension: "py" });
  assert.deepEqual(config.logging, { runLogs: true });
});

test("rejects invalid values with the offending key", async () => {
  const dataDir = tempHome();
  await assert.rejects(
    () => ConfigLoader.load({ dataDir, env: { REQDECK_TIMEOUT_MS: "soon" } }),
    { message: "Invalid REQDECK_TIMEOUT_MS: expected number." },
  );
  await assert.rejects(
    () => ConfigLoader.load({ dataDir, env: { REQDECK_DEBUG: "maybe" } }),
    { message: "Invalid REQDECK_DEBUG: expected boolean." },
  );
  writeFileSync(path.join(dataDir, "config.json"), JSON.stringify({ debug: "yes" }), "utf8");
  await assert.rejects(() => ConfigLoader.load({ dataDir, env: {} }), { message: "Invalid config.debug: expected boolean." });
});

test("setDebug persists the toggle and keeps other keys", async () => {
  const dataDir = tempHome();
  writeFileSync(path.join(dataDir, "config.json"), JSON.stringify({ timeoutMs: 1000 }), "utf8");
  await ConfigLoader.setDebug(true, dataDir);
  assert.deepEqual(JSON.parse(readFileSync(path.join(dataDir, "config.json"), "utf8")), { timeoutMs: 1000, debug: true });
  const config = await ConfigLoader.load({ dataDir, env: {} });
  assert.equal(config.debug, true);
});
