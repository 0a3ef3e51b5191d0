import { ConfigLoader, HistoryService, type HistoryEntry } from "@reqdeck/core";
import { formatSize } from "@reqdeck/shared";
import { applyExitCode, withExecutor } from "../request/ExecutorSession.js";
import { parseRequestArgs } from "../request/RequestArgs.js";

/* eslint-disable no-console */

const historyUsage = `Usage: reqdeck history [-s <search>] [-n <count>] [--clear]`;
const replayUsage = `Usage: reqdeck replay <index> [options]`;
const diffUsage = `Usage: reqdeck diff <index1> <index2>
       reqdeck diff <file1> <file2>`;

export interface HistoryArgs {
  search?: string;
  last?: number;
  clear: boolean;
  help: boolean;
}

export const parseHistoryArgs = (argv: string[]): HistoryArgs => {
  const parsed: HistoryArgs = { clear: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-s":
      case "--search": {
        const value = argv[i + 1];
        if (value === undefined || !value.trim()) {
          throw new Error(`Missing value for ${arg}\n\n${historyUsage}`);
        }
        parsed.search = value;
        i += 1;
        break;
      }
      case "-n":
      case "--last": {
        const value = argv[i + 1] ?? "";
        if (!/^\d+$/.test(value)) {
          throw new Error(`Invalid ${arg}: expected a number.`);
        }
        parsed.last = Number.parseInt(value, 10);
        i += 1;
        break;
      }
      case "--clear":
        parsed.clear = true;
        break;
      case "-h":
      case "--help":
        parsed.help = true;
        break;
      default:
        throw new Error(`Unknown flag: ${arg}\n\n${historyUsage}`);
    }
  }
  return parsed;
};

export const formatHistoryLine = ({ index, record }: HistoryEntry): string =>
  `[${index}] ${record.method} ${record.url}  status=${record.status}  time=${record.elapsedMs.toFixed(1)}ms  ` +
  `size=${formatSize(record.size)}  date=${record.timestamp}`;

const parseIndex = (raw: string | undefined): number => {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new Error(`Invalid history index: ${raw ?? "(missing)"}\n\n${replayUsage}`);
  }
  return Number.parseInt(raw, 10);
};

const withHistory = async <T>(fn: (history: HistoryService) => Promise<T>): Promise<T> => {
  const config = await ConfigLoader.load();
  const history = await HistoryService.create(config.dataDir);
  try {
    return await fn(history);
  } finally {
    await history.close();
  }
};

export class HistoryCommands {
  static async run(argv: string[]): Promise<void> {
    const args = parseHistoryArgs(argv);
    if (args.help) {
      console.log(historyUsage);
      return;
    }
    await withHistory(async (history) => {
      if (args.clear) {
        await history.clear();
        console.log("History cleared.");
        return;
      }
      const entries = await history.list({ search: args.search, last: args.last });
      if (entries.length === 0) {
        console.log("No history found.");
        return;
      }
      for (const entry of entries) {
        console.log(formatHistoryLine(entry));
      }
    });
  }

  /** Sends a past request again. Flags given here are laid over the recorded output settings. */
  static async runReplay(argv: string[]): Promise<void> {
    const args = parseRequestArgs(argv);
    if (args.help) {
      console.log(replayUsage);
      return;
    }
    const index = parseIndex(args.positionals[0]);
    const plan = await withHistory((history) => history.replay(index));
    const options = { ...plan.options, ...args.options };
    if (args.auth !== undefined) options.authOverride = args.auth;
    const config = await ConfigLoader.load();
    const summary = await withExecutor(config, (executor) => executor.execute(plan.descriptor, options), args.saveVars);
    applyExitCode([summary]);
  }

  static async runDiff(argv: string[]): Promise<void> {
    if (argv.includes("--help") || argv.includes("-h")) {
      console.log(diffUsage);
      return;
    }
    const [first, second] = argv;
    if (first === undefined || second === undefined || argv.length !== 2) {
      throw new Error(diffUsage);
    }
    const lines = await withHistory((history) => history.diff(first, second));
    console.log(lines.length > 0 ? lines.join("\n") : "No differences.");
  }
}
