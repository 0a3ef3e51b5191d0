import { RequestExecutor, type ExecutionSummary, type ReqdeckConfig } from "@reqdeck/core";
import { ConsoleReporter } from "../../render/ConsoleReporter.js";
import { ReadlinePrompter } from "../../render/ReadlinePrompter.js";

/** Opens an executor on the configured stores for the length of `fn`. */
export const withExecutor = async <T>(
  config: ReqdeckConfig,
  fn: (executor: RequestExecutor) => Promise<T>,
  persistPrompted = false,
): Promise<T> => {
  const executor = await RequestExecutor.create({
    config,
    prompter: new ReadlinePrompter(),
    reporter: new ConsoleReporter(),
    persistPrompted,
  });
  try {
    return await fn(executor);
  } finally {
    await executor.close();
  }
};

/** A run with a failed iteration or a failed assertion exits non-zero. */
export const applyExitCode = (summaries: ExecutionSummary[]): void => {
  const failed = summaries.some(
    (summary) => summary.failures.length > 0 || summary.assertions.some((outcome) => !outcome.passed),
  );
  if (failed) {
    process.exitCode = 1;
  }
};
