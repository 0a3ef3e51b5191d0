import { ChainRunner, ConfigLoader, type ChainStepResult } from "@reqdeck/core";
import { applyExitCode, withExecutor } from "../request/ExecutorSession.js";

/* eslint-disable no-console */

const usage = `Usage: reqdeck chain <file.json|file.yaml>

Sends each request of the file in order. Each entry takes method, url, headers,
data, auth and the optional outputFile, only and assertion keys.`;

export class ChainCommand {
  static async run(argv: string[]): Promise<void> {
    const [file] = argv;
    if (!file || file === "--help" || file === "-h") {
      console.log(usage);
      return;
    }
    const config = await ConfigLoader.load();
    const results: ChainStepResult[] = await withExecutor(config, async (executor) => {
      const runner = new ChainRunner(executor);
      const steps = await runner.load(file);
      return runner.run(steps, {
        onStep: (step, descriptor) => console.log(`Step ${step}: ${descriptor.method.toUpperCase()} ${descriptor.url}`),
      });
    });
    for (const result of results) {
      if (result.error) {
        console.error(`Step ${result.step} failed: ${result.error}`);
        process.exitCode = 1;
      }
    }
    applyExitCode(results.flatMap((result) => (result.summary ? [result.summary] : [])));
  }
}
