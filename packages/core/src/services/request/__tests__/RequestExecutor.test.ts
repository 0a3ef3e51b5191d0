import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { isReqdeckError, type VariableMap } from "@reqdeck/shared";
import { RequestExecutor, type ExecutionContext } from "../RequestExecutor.js";
import { RunLogger } from "../../../logging/RunLogger.js";
import {
  MemoryHistoryStore,
  MemoryVariableStore,
  RecordingReporter,
  ScriptedPrompter,
  StubScriptRunner,
  StubTransport,
} from "./fakes.js";

interface Harness {
  executor: RequestExecutor;
  transport: StubTransport;
  history: MemoryHistoryStore;
  variables: MemoryVariableStore;
  reporter: RecordingReporter;
  prompter: ScriptedPrompter;
  scripts: StubScriptRunner;
  sleeps: number[];
}

const harness = (
  options: {
    context?: ExecutionContext;
    variables?: VariableMap;
    prompter?: ScriptedPrompter;
    transport?: StubTransport;
    scripts?: StubScriptRunner;
    logger?: RunLogger;
    random?: () => number;
  } = {},
): Harness => {
  const transport = options.transport ?? new StubTransport();
  const history = new MemoryHistoryStore();
  const variables = new MemoryVariableStore(options.variables);
  const reporter = new RecordingReporter();
  const prompter = options.prompter ?? new ScriptedPrompter();
  const scripts = options.scripts ?? new StubScriptRunner();
  const sleeps: number[] = [];
  let clock = 0;
  const executor = new RequestExecutor(
    {
      variables,
      history,
      transport,
      prompter,
      reporter,
      scripts,
      logger: options.logger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      random: options.random,
      now: () => {
        clock += 5;
        return clock;
      },
    },
    options.context ?? { debug: false },
  );
  return { executor, transport, history, variables, reporter, prompter, scripts, sleeps };
};

const tempDir = (): string => mkdtempSync(path.join(os.tmpdir(), "reqdeck-exec-"));

test("sends a resolved request and records it", async () => {
  const h = harness({ variables: { host: "api.test", token: "test-token" } });
  const summary = await h.executor.execute({
    method: "post",
    url: " https://{{host}}/items ",
    headers: { "X-Trace": "{{host}}" },
    body: { owner: "{{host}}", empty: {} },
    auth: "bearer {{token}}",
  });

  assert.deepEqual(h.transport.sent, [
    {
      method: "POST",
      url: "https://api.test/items",
      headers: { "X-Trace": "api.test", Authorization: "Bearer test-token" },
      body: { owner: "api.test", empty: {} },
    },
  ]);
  assert.equal(summary.dispatched, 1);
  assert.equal(h.history.records.length, 1);
  const record = h.history.records[0];
  assert.equal(record.method, "POST");
  assert.equal(record.url, "https://api.test/items");
  assert.equal(record.status, 200);
  assert.equal(record.reason, "OK");
  assert.equal(record.elapsedMs, 5);
  assert.equal(record.size, 11);
  assert.equal(record.body, '{\n  "ok": true\n}');
  assert.deepEqual(record.requestBody, { owner: "api.test", empty: {} });
  assert.deepEqual(summary.records, [record]);
  assert.deepEqual(h.reporter.events, ["response 200"]);
});

test("an empty object body is sent as no body while other falsy bodies are kept", async () => {
  const h = harness();
  await h.executor.execute({ method: "POST", url: "https://api.test/a", body: {} });
  await h.executor.execute({ method: "POST", url: "https://api.test/b", body: { a: 1 } });
  await h.executor.execute({ method: "POST", url: "https://api.test/c", body: [] });
  assert.equal("body" in h.transport.sent[0], false);
  assert.deepEqual(h.transport.sent[1].body, { a: 1 });
  assert.deepEqual(h.transport.sent[2].body, []);
  assert.equal(h.history.records[0].requestBody, undefined);
});

test("a null body is sent as no body", async () => {
  const h = harness();
  await h.executor.execute({ method: "POST", url: "https://api.test/a", body: null });
  assert.equal(h.transport.sent.length, 1);
  assert.equal("body" in h.transport.sent[0], false);
  assert.equal(h.history.records[0].requestBody, undefined);
});

test("a missing variable in strict mode sends and records nothing", async () => {
  const dir = tempDir();
  const file = path.join(dir, "targets.txt");
  writeFileSync(file, "https://a.test\nhttps://{{missing}}.test\n", "utf8");
  const h = harness();
  await assert.rejects(
    () => h.executor.execute({ method: "GET", url: file }),
    (error: unknown) => isReqdeckError(error, "missing_variable") && error.details.field === "url",
  );
  assert.equal(h.transport.sent.length, 0);
  assert.equal(h.history.records.length, 0);
});

test("interactive mode prompts for unknown variables and can persist them", async () => {
  const prompter = new ScriptedPrompter({ values: { token: "test-token" } });
  const h = harness({ prompter, context: { debug: false, persistPrompted: true } });
  await h.executor.execute(
    { method: "GET", url: "https://api.test/{{token}}", auth: "bearer {{token}}" },
    { fillVariables: true },
  );
  assert.deepEqual(prompter.questions, ["Enter value for 'token' (used in url): "]);
  assert.equal(h.transport.sent[0].url, "https://api.test/test-token");
  assert.equal(h.transport.sent[0].headers.Authorization, "Bearer test-token");
  assert.deepEqual(h.variables.saved, [["token", "test-token"]]);
});

test("a file of targets dispatches once per line in file order", async () => {
  const dir = tempDir();
  const file = path.join(dir, "targets.txt");
  writeFileSync(file, "https://one.test\n\nhttps://two.test\nhttps://three.test\n", "utf8");
  const h = harness();
  const summary = await h.executor.execute({ method: "GET", url: file });
  assert.deepEqual(
    h.transport.sent.map((request) => request.url),
    ["https://one.test", "https://two.test", "https://three.test"],
  );
  assert.equal(summary.dispatched, 3);
  assert.equal(h.history.records.length, 3);
});

test("a transport failure ends only its own iteration", async () => {
  const dir = tempDir();
  const file = path.join(dir, "targets.txt");
  writeFileSync(file, "https://down.test\nhttps://up.test\n", "utf8");
  const transport = new StubTransport();
  transport.failures.add("https://down.test");
  const h = harness({ transport });
  const summary = await h.executor.execute({ method: "GET", url: file });
  assert.equal(summary.dispatched, 1);
  assert.deepEqual(summary.failures, [
    {
      stage: "transport",
      code: "transport_error",
      message: "connect ECONNREFUSED https://down.test",
      target: "https://down.test",
      iteration: 1,
    },
  ]);
  assert.deepEqual(h.reporter.failures, summary.failures);
  assert.deepEqual(
    h.history.records.map((record) => record.url),
    ["https://up.test"],
  );
});

test("a malformed auth descriptor ends the iteration without sending", async () => {
  const h = harness();
  const summary = await h.executor.execute(
    { method: "GET", url: "https://api.test", auth: "bearer test-token" },
    { authOverride: "basic nocolon" },
  );
  assert.equal(h.transport.sent.length, 0);
  assert.equal(summary.failures[0]?.code, "malformed_auth");
  assert.equal(summary.failures[0]?.stage, "auth");
});

test("dry run in debug mode previews without sending or recording", async () => {
  const h = harness({ context: { debug: true } });
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { dryRun: true });
  assert.equal(h.transport.sent.length, 0);
  assert.equal(h.history.records.length, 0);
  assert.equal(summary.dryRuns, 1);
  assert.deepEqual(h.reporter.events, ["preview GET https://api.test", "dry-run https://api.test"]);
  assert.deepEqual(h.prompter.confirmations, []);
});

test("dry run outside debug mode is ignored and the request is sent", async () => {
  const h = harness();
  await h.executor.execute({ method: "GET", url: "https://api.test" }, { dryRun: true });
  assert.equal(h.transport.sent.length, 1);
  assert.deepEqual(h.reporter.notices, ["Debug-only options ignored outside debug mode: dry-run."]);
});

test("preview asks for confirmation and a decline has no side effects", async () => {
  const declined = harness({ prompter: new ScriptedPrompter({ confirm: false }) });
  const summary = await declined.executor.execute({ method: "GET", url: "https://api.test" }, { preview: true });
  assert.deepEqual(declined.prompter.confirmations, ["Send this request? (y/N): "]);
  assert.equal(declined.transport.sent.length, 0);
  assert.equal(declined.history.records.length, 0);
  assert.equal(summary.cancelled, 1);

  const accepted = harness({ prompter: new ScriptedPrompter({ confirm: true }) });
  await accepted.executor.execute({ method: "GET", url: "https://api.test" }, { preview: true });
  assert.equal(accepted.transport.sent.length, 1);
});

test("skip-history is honoured only in debug mode", async () => {
  const debug = harness({ context: { debug: true } });
  await debug.executor.execute({ method: "GET", url: "https://api.test" }, { skipHistory: true });
  assert.equal(debug.transport.sent.length, 1);
  assert.equal(debug.history.records.length, 0);

  const normal = harness();
  await normal.executor.execute({ method: "GET", url: "https://api.test" }, { skipHistory: true });
  assert.equal(normal.history.records.length, 1);
});

test("repeat sleeps between iterations but not after the last", async () => {
  const h = harness({ context: { debug: true } });
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { repeat: 3, intervalMs: 100 });
  assert.equal(h.transport.sent.length, 3);
  assert.deepEqual(h.sleeps, [100, 100]);
  assert.equal(summary.dispatched, 3);
});

test("repeat outside debug mode sends once and says so", async () => {
  const h = harness();
  await h.executor.execute({ method: "GET", url: "https://api.test" }, { repeat: 3, intervalMs: 100 });
  assert.equal(h.transport.sent.length, 1);
  assert.deepEqual(h.sleeps, []);
  assert.deepEqual(h.reporter.notices, ["Debug-only options ignored outside debug mode: repeat, interval."]);
});

test("mock in debug mode answers without the transport", async () => {
  const h = harness({ context: { debug: true }, random: () => 0.5 });
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { mock: true, verbose: true });
  assert.equal(h.transport.sent.length, 0);
  const record = summary.records[0];
  assert.equal(record.status, 400);
  assert.equal(record.reason, "Bad Request");
  assert.equal(record.elapsedMs, 55);
  assert.equal(record.body, '{\n  "mock": true,\n  "status": 400,\n  "message": "This is a mock response."\n}');
  assert.deepEqual(record.responseHeaders, { "Content-Type": "application/json" });
  assert.deepEqual(h.reporter.events, ["exchange https://api.test 400 mocked", "response 400"]);
  assert.equal(h.history.records.length, 1);
});

test("writes the response report to the output file", async () => {
  const dir = tempDir();
  const outputFile = path.join(dir, "out.txt");
  const h = harness();
  const summary = await h.executor.execute(
    { method: "GET", url: "https://api.test" },
    { outputFile, displayFilter: "body" },
  );
  assert.equal(
    readFileSync(outputFile, "utf8"),
    [
      "Request Method: GET",
      "Status: 200 OK",
      "============================",
      "Headers:",
      '{\n  "content-type": "application/json"\n}',
      "============================",
      "Body:",
      '{\n  "ok": true\n}',
    ].join("\n"),
  );
  assert.deepEqual(h.reporter.events, ["response 200", `output ${outputFile}`]);
  assert.equal(summary.records[0].outputFile, outputFile);
  assert.equal(summary.records[0].displayFilter, "body");
});

test("an output write failure is reported and history is still recorded", async () => {
  const dir = tempDir();
  const outputFile = path.join(dir, "missing", "out.txt");
  const h = harness();
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { outputFile });
  assert.equal(summary.failures[0]?.code, "output_write_error");
  assert.ok(summary.failures[0]?.message.startsWith(`Failed to write to output file '${outputFile}'`));
  assert.equal(h.history.records.length, 1);
});

test("a history failure is reported without aborting the call", async () => {
  const h = harness();
  h.history.failWith = new Error("disk full");
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { assertion: "status=200" });
  assert.equal(summary.failures[0]?.stage, "history");
  assert.equal(summary.failures[0]?.code, "history_io_error");
  assert.equal(summary.assertions[0]?.passed, true);
});

test("a passing assertion runs its script and an invalid one is reported", async () => {
  const scripts = new StubScriptRunner([2]);
  const h = harness({ scripts });
  await h.executor.execute({ method: "GET", url: "https://api.test" }, { assertion: "body_contains=ok,2" });
  assert.deepEqual(scripts.ran, [2]);
  assert.equal(h.reporter.outcomes[0]?.passed, true);

  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { assertion: "header=x" });
  assert.equal(summary.assertions[0]?.passed, false);
  assert.equal(summary.failures[0]?.code, "invalid_assertion");
  assert.equal(h.reporter.failures.length, 0);
});

test("run logs capture dispatch and response events", async () => {
  const logger = new RunLogger(tempDir(), "run-1");
  const h = harness({ logger });
  await h.executor.execute({ method: "GET", url: "https://api.test" });
  const events = readFileSync(logger.logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line).type);
  assert.deepEqual(events, ["dispatch", "response"]);
});

test("an unwritable run log is reported once and the requests still go out", async () => {
  const dir = tempDir();
  const blocker = path.join(dir, "file");
  writeFileSync(blocker, "not a directory", "utf8");
  const logger = new RunLogger(path.join(blocker, "logs"), "run-2");
  const h = harness({ logger, context: { debug: true } });
  const summary = await h.executor.execute({ method: "GET", url: "https://api.test" }, { repeat: 2 });
  assert.equal(summary.dispatched, 2);
  assert.equal(h.history.records.length, 2);
  assert.deepEqual(summary.failures, []);
  assert.equal(h.reporter.notices.length, 1);
  assert.ok(h.reporter.notices[0]?.startsWith(`Run log disabled: could not write ${logger.logPath}: `));
});
