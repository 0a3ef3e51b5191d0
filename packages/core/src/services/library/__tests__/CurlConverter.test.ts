import test from "node:test";
import assert from "node:assert/strict";
import { isReqdeckError } from "@reqdeck/shared";
import { exportCurl, importCurl, quoteShellWord, splitShellWords } from "../CurlConverter.js";

test("splits words with shell quoting rules", () => {
  assert.deepEqual(splitShellWords(`a\\ b "c d" 'e'f "x\\"y" '\\n'`), ["a b", "c d", "ef", 'x"y', "\\n"]);
  assert.deepEqual(splitShellWords("curl \\\n  https://api.test"), ["curl", "https://api.test"]);
  assert.throws(() => splitShellWords("curl 'open"), /Unterminated quote/);
});

test("imports method, headers, JSON data and url", () => {
  const descriptor = importCurl(
    `curl -X post -H 'Content-Type: application/json' -H "X-Msg: say \\"hi\\"" -d '{"name":"ada"}' https://api.test/users`,
  );
  assert.deepEqual(descriptor, {
    method: "POST",
    url: "https://api.test/users",
    headers: { "Content-Type": "application/json", "X-Msg": 'say "hi"' },
    body: { name: "ada" },
  });
});

test("data without a method is a POST and non-JSON data stays text", () => {
  assert.deepEqual(importCurl("curl https://api.test --data-raw 'a=b'"), {
    method: "POST",
    url: "https://api.test",
    headers: {},
    body: "a=b",
  });
});

test("user credentials become basic auth", () => {
  assert.deepEqual(importCurl("curl -u user:pass https://api.test"), {
    method: "GET",
    url: "https://api.test",
    headers: {},
    auth: "basic user:pass",
  });
});

test("rejects commands that are not curl or have no url", () => {
  assert.throws(
    () => importCurl("wget https://api.test"),
    (error: unknown) => isReqdeckError(error, "invalid_input") && error.message === "Not a valid cURL command.",
  );
  assert.throws(() => importCurl("curl -X GET"), { message: "Could not parse URL from cURL command." });
  assert.throws(() => importCurl("curl https://api.test -H"), { message: "Missing value for -H in cURL command." });
});

test("exports shell-quoted commands", () => {
  assert.equal(quoteShellWord(""), "''");
  assert.equal(quoteShellWord("https://api.test/a"), "https://api.test/a");
  assert.equal(
    exportCurl({ method: "GET", url: "https://api.test/items?a=1&b=2", headers: { Accept: "application/json" } }),
    "curl -H 'Accept: application/json' 'https://api.test/items?a=1&b=2'",
  );
  assert.equal(
    exportCurl({ method: "post", url: "https://api.test", body: { name: "O'Brien" }, auth: "basic user:pass" }),
    `curl -X POST -u user:pass -d '{"name":"O'"'"'Brien"}' https://api.test`,
  );
  assert.equal(
    exportCurl({ method: "GET", url: "https://api.test", auth: "bearer test-token", body: {} }),
    "curl -H 'Authorization: Bearer test-token' https://api.test",
  );
});

test("an exported command imports back to the same request", () => {
  const original = {
    method: "PUT",
    url: "https://api.test/items/1",
    headers: { "X-Team": "core" },
    body: { tags: ["a", "b"], count: 2 },
  };
  assert.deepEqual(importCurl(exportCurl(original)), original);
});
