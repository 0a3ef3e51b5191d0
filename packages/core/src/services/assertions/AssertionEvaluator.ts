import {
  createInvalidAssertionError,
  describeError,
  isReqdeckError,
  type ReqdeckError,
  type ResponseRecord,
} from "@reqdeck/shared";
import type { ScriptRunResult, ScriptRunner } from "./ScriptRunner.js";

export type AssertionKind = "status" | "body_contains";

export type ParsedAssertion =
  | { kind: "status"; condition: string; expected: number; script?: string }
  | { kind: "body_contains"; condition: string; expected: string; script?: string };

export interface AssertionOutcome {
  condition: string;
  passed: boolean;
  message: string;
  error?: ReqdeckError;
  script?: ScriptRunResult;
  scriptError?: string;
}

const MIN_SCRIPT_ID = 1;
const MAX_SCRIPT_ID = 5;

/** Parses `cond[,script]`. Throws `invalid_assertion` for an unknown kind or a non-integer status. */
export const parseAssertion = (input: string): ParsedAssertion => {
  const separator = input.indexOf(",");
  const condition = separator === -1 ? input : input.slice(0, separator);
  const script = separator === -1 ? undefined : input.slice(separator + 1).trim();
  if (condition.startsWith("status=")) {
    const raw = condition.slice("status=".length).trim();
    if (!/^-?\d+$/.test(raw)) {
      throw createInvalidAssertionError(condition, "status must be an integer");
    }
    return { kind: "status", condition, expected: Number.parseInt(raw, 10), script };
  }
  if (condition.startsWith("body_contains=")) {
    return { kind: "body_contains", condition, expected: condition.slice("body_contains=".length), script };
  }
  throw createInvalidAssertionError(condition, "expected status=<code> or body_contains=<text>");
};

/** Script ids run only when they are all digits and within 1-5. */
export const scriptIdFrom = (script: string | undefined): number | undefined => {
  if (!script || !/^\d+$/.test(script)) return undefined;
  const id = Number.parseInt(script, 10);
  return id >= MIN_SCRIPT_ID && id <= MAX_SCRIPT_ID ? id : undefined;
};

export class AssertionEvaluator {
  constructor(private readonly scripts?: ScriptRunner) {}

  evaluate(input: string, record: ResponseRecord): AssertionOutcome {
    let parsed: ParsedAssertion;
    try {
      parsed = parseAssertion(input);
    } catch (error) {
      if (!isReqdeckError(error, "invalid_assertion")) throw error;
      return { condition: input, passed: false, message: error.message, error };
    }

    const outcome = this.check(parsed, record);
    if (!outcome.passed) return outcome;

    const scriptId = scriptIdFrom(parsed.script);
    if (scriptId === undefined || !this.scripts) return outcome;
    try {
      outcome.script = this.scripts.run(scriptId);
    } catch (error) {
      outcome.scriptError = `Script ${scriptId} failed to start: ${describeError(error)}`;
    }
    return outcome;
  }

  private check(parsed: ParsedAssertion, record: ResponseRecord): AssertionOutcome {
    if (parsed.kind === "status") {
      const passed = record.status === parsed.expected;
      return {
        condition: parsed.condition,
        passed,
        message: passed
          ? `Assertion passed: status=${parsed.expected}`
          : `Assertion failed: status=${record.status} (expected ${parsed.expected})`,
      };
    }
    const passed = record.body.includes(parsed.expected);
    return {
      condition: parsed.condition,
      passed,
      message: passed
        ? `Assertion passed: body contains '${parsed.expected}'`
        : `Assertion failed: body does not contain '${parsed.expected}'`,
    };
  }
}
