import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { ResponseRecord } from "@reqdeck/shared";
import { ConsoleReporter, formatResponseLines, formatStatusLine } from "../render/ConsoleReporter.js";
import { captureOutput } from "./helpers.js";

const record = (overrides: Partial<ResponseRecord> = {}): ResponseRecord => ({
  method: "GET",
  url: "https://api.test",
  headers: {},
  status: 200,
  reason: "OK",
  elapsedMs: 12.5,
  size: 2048,
  timestamp: "2026-01-01T00:00:00.000Z",
  body: '{\n  "ok": true\n}',
  responseHeaders: { "content-type": "application/json" },
  ...overrides,
});

const headersJson = '{\n  "content-type": "application/json"\n}';

describe("response rendering", () => {
  it("formats the status line with time and size", () => {
    assert.equal(formatStatusLine(record()), "Status: 200 OK  Time: 12.50 ms  Size: 2.00 KB");
  });

  it("prints everything without a display filter", () => {
    assert.deepEqual(formatResponseLines(record()), [
      "Status: 200 OK  Time: 12.50 ms  Size: 2.00 KB",
      "Headers:",
      headersJson,
      "Body:",
      '{\n  "ok": true\n}',
    ]);
  });

  it("narrows output to the display filter", () => {
    assert.deepEqual(formatResponseLines(record({ displayFilter: "status" })), [
      "Status: 200 OK  Time: 12.50 ms  Size: 2.00 KB",
    ]);
    assert.deepEqual(formatResponseLines(record({ displayFilter: "headers" })), ["Headers:", headersJson]);
    assert.deepEqual(formatResponseLines(record({ displayFilter: "body" })), ['{\n  "ok": true\n}']);
  });
});

describe("ConsoleReporter", () => {
  it("prints a request preview", async () => {
    const reporter = new ConsoleReporter();
    const { logs } = await captureOutput(() =>
      reporter.preview({ method: "POST", url: "https://api.test", headers: { A: "1" }, body: { a: 1 } }),
    );
    assert.deepEqual(logs, [
      'REQUEST PREVIEW\nMethod: POST\nURL: https://api.test\nHeaders: {\n  "A": "1"\n}\nData: {\n  "a": 1\n}',
    ]);
  });

  it("reports assertions with their script result", async () => {
    const reporter = new ConsoleReporter();
    const { logs } = await captureOutput(() =>
      reporter.assertion({
        condition: "status=200",
        passed: true,
        message: "Assertion passed: status=200",
        script: { scriptId: 3, path: "/scripts/3.js", found: false },
      }),
    );
    assert.deepEqual(logs, ["Assertion passed: status=200", "Script 3 not found."]);
  });

  it("writes failures to stderr with target and iteration", async () => {
    const reporter = new ConsoleReporter();
    const { logs, errors } = await captureOutput(() =>
      reporter.failure({
        stage: "transport",
        code: "transport_error",
        message: "boom",
        target: "https://api.test",
        iteration: 2,
      }),
    );
    assert.deepEqual(logs, []);
    assert.deepEqual(errors, ["Error [transport] https://api.test (iteration 2): boom"]);
  });
});
