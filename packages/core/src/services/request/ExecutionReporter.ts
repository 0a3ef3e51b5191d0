import type { PreparedRequest, ReqdeckErrorCode, ResponseRecord } from "@reqdeck/shared";
import type { AssertionOutcome } from "../assertions/AssertionEvaluator.js";

export type FailureStage = "auth" | "transport" | "output" | "history" | "assertion";

export interface ExecutionFailure {
  stage: FailureStage;
  code: ReqdeckErrorCode;
  message: string;
  target: string;
  iteration: number;
}

/** Where the executor announces what it does. The CLI renders these to the terminal. */
export interface ExecutionReporter {
  preview(request: PreparedRequest): void;
  dryRun(request: PreparedRequest): void;
  cancelled(request: PreparedRequest): void;
  notice(message: string): void;
  exchange(request: PreparedRequest, record: ResponseRecord, mocked: boolean): void;
  response(record: ResponseRecord): void;
  outputWritten(outputFile: string): void;
  assertion(outcome: AssertionOutcome): void;
  failure(failure: ExecutionFailure): void;
}

export interface Prompter {
  confirm(message: string): Promise<boolean>;
  ask(message: string): Promise<string>;
}
