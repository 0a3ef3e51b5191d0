import type { AssertionOutcome, ExecutionFailure, ExecutionReporter } from "@reqdeck/core";
import {
  formatElapsed,
  formatJson,
  formatSize,
  type JsonValue,
  type PreparedRequest,
  type ResponseRecord,
} from "@reqdeck/shared";

/* eslint-disable no-console */

const formatData = (body: JsonValue | undefined): string => (body === undefined ? "none" : formatJson(body));

export const formatStatusLine = (record: ResponseRecord): string =>
  `Status: ${record.status} ${record.reason}  Time: ${formatElapsed(record.elapsedMs)}  Size: ${formatSize(record.size)}`;

export const formatRequestLines = (request: PreparedRequest): string[] => [
  `Method: ${request.method}`,
  `URL: ${request.url}`,
  `Headers: ${formatJson(request.headers)}`,
  `Data: ${formatData(request.body)}`,
];

/** Response lines, narrowed by the record's display filter. */
export const formatResponseLines = (record: ResponseRecord): string[] => {
  switch (record.displayFilter) {
    case "status":
      return [formatStatusLine(record)];
    case "headers":
      return ["Headers:", formatJson(record.responseHeaders)];
    case "body":
      return [record.body];
    default:
      return [formatStatusLine(record), "Headers:", formatJson(record.responseHeaders), "Body:", record.body];
  }
};

export class ConsoleReporter implements ExecutionReporter {
  preview(request: PreparedRequest): void {
    console.log(["REQUEST PREVIEW", ...formatRequestLines(request)].join("\n"));
  }

  dryRun(): void {
    console.log("[DRY RUN] No request sent.");
  }

  cancelled(): void {
    console.log("Cancelled.");
  }

  notice(message: string): void {
    console.log(message);
  }

  exchange(request: PreparedRequest, record: ResponseRecord, mocked: boolean): void {
    console.log(
      [
        mocked ? "[VERBOSE] MOCK REQUEST" : "[VERBOSE] REQUEST SENT",
        ...formatRequestLines(request),
        mocked ? "[VERBOSE] MOCK RESPONSE" : "[VERBOSE] RESPONSE RECEIVED",
        `Status: ${record.status} ${record.reason}`,
        `Headers: ${formatJson(record.responseHeaders)}`,
        `Body: ${record.body}`,
      ].join("\n"),
    );
  }

  response(record: ResponseRecord): void {
    console.log(formatResponseLines(record).join("\n"));
  }

  outputWritten(outputFile: string): void {
    console.log(`Response written to '${outputFile}'`);
  }

  assertion(outcome: AssertionOutcome): void {
    console.log(outcome.message);
    if (outcome.script) {
      const { scriptId, found, exitCode } = outcome.script;
      console.log(found ? `Script ${scriptId} exited with code ${exitCode ?? "unknown"}.` : `Script ${scriptId} not found.`);
    }
    if (outcome.scriptError) {
      console.error(outcome.scriptError);
    }
  }

  failure(failure: ExecutionFailure): void {
    const where = failure.iteration > 1 ? `${failure.target} (iteration ${failure.iteration})` : failure.target;
    console.error(`Error [${failure.stage}] ${where}: ${failure.message}`);
  }
}
