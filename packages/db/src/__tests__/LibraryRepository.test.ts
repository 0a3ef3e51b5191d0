import { strict as assert } from "node:assert";
import { test, beforeEach, afterEach } from "node:test";
import os from "node:os";
import path from "node:path";
import fs from "node:fs";
import { Connection } from "../sqlite/connection.js";
import { StoreMigrations } from "../migrations/store/StoreMigrations.js";
import { LibraryRepository } from "../repositories/library/LibraryRepository.js";

let repo: LibraryRepository;
let dbPath: string;

beforeEach(async () => {
  dbPath = path.join(os.tmpdir(), `reqdeck-library-${Date.now()}-${Math.random()}.db`);
  const conn = await Connection.open(dbPath);
  await StoreMigrations.run(conn.db);
  repo = new LibraryRepository(conn.db, conn);
});

afterEach(async () => {
  await repo.close();
  await fs.promises.unlink(dbPath).catch(() => {});
});

test("stores, overwrites and removes variables", async () => {
  await repo.setVariable("host", "api.test");
  await repo.setVariable("token", "first");
  await repo.setVariable("token", "second");
  assert.deepEqual(await repo.load(), { host: "api.test", token: "second" });

  assert.equal(await repo.removeVariable("token"), true);
  assert.equal(await repo.removeVariable("token"), false);
  assert.deepEqual(await repo.load(), { host: "api.test" });

  await repo.setVariable("a", "1");
  assert.deepEqual(await repo.load(), { a: "1", host: "api.test" });
  assert.equal(await repo.clearVariables(), 2);
  assert.deepEqual(await repo.load(), {});
});

test("saves global aliases separately from collection aliases", async () => {
  await repo.saveAlias("users", { method: "get", url: "https://api.test/users", body: {} });
  await repo.saveAlias(
    "users",
    { method: "POST", url: "https://api.test/users", headers: { "X-Team": "core" }, body: { name: "ada" }, auth: "bearer t0k" },
    "admin",
  );

  const global = await repo.getAlias("users");
  assert.deepEqual(global?.request, { method: "GET", url: "https://api.test/users", headers: {} });
  assert.equal(global?.collection, undefined);

  const scoped = await repo.getAlias("users", "admin");
  assert.deepEqual(scoped?.request, {
    method: "POST",
    url: "https://api.test/users",
    headers: { "X-Team": "core" },
    body: { name: "ada" },
    auth: "bearer t0k",
  });
  assert.equal(scoped?.collection, "admin");

  assert.deepEqual(await repo.listCollections(), [{ name: "admin", aliasCount: 1 }]);
  assert.equal((await repo.listAliases()).length, 1);
  assert.equal((await repo.listAllAliases()).length, 2);
});

test("deletes aliases and whole collections", async () => {
  await repo.saveAlias("a", { method: "GET", url: "https://api.test/a" }, "team");
  await repo.saveAlias("b", { method: "GET", url: "https://api.test/b" }, "team");
  assert.equal(await repo.deleteAlias("a", "team"), true);
  assert.equal(await repo.deleteAlias("a", "team"), false);
  assert.equal(await repo.deleteCollection("team"), 1);
  assert.deepEqual(await repo.listCollections(), []);
});

test("round-trips templates with their dispatch options", async () => {
  await repo.saveTemplate(
    "health",
    { method: "GET", url: "https://api.test/health" },
    { assertion: "status=200", displayFilter: "status", repeat: 2 },
  );
  const template = await repo.getTemplate("health");
  assert.deepEqual(template?.options, { assertion: "status=200", displayFilter: "status", repeat: 2 });
  assert.equal((await repo.listTemplates()).length, 1);
  assert.equal(await repo.deleteTemplate("health"), true);
  assert.equal(await repo.getTemplate("health"), undefined);
});

test("clears every alias, template and variable at once", async () => {
  await repo.saveAlias("a", { method: "GET", url: "https://api.test/a" });
  await repo.saveAlias("b", { method: "GET", url: "https://api.test/b" }, "team");
  await repo.saveTemplate("health", { method: "GET", url: "https://api.test/health" }, {});
  await repo.setVariable("token", "test-secret");
  assert.deepEqual(await repo.clearAll(), { aliases: 2, templates: 1, variables: 1 });
  assert.deepEqual(await repo.listAllAliases(), []);
  assert.deepEqual(await repo.listCollections(), []);
  assert.deepEqual(await repo.listTemplates(), []);
  assert.deepEqual(await repo.load(), {});
});
