import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export interface CapturedOutput {
  logs: string[];
  errors: string[];
}

export const captureOutput = async (fn: () => Promise<void> | void): Promise<CapturedOutput> => {
  const logs: string[] = [];
  const errors: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  console.log = (...args: unknown[]) => {
    logs.push(args.join(" "));
  };
  console.error = (...args: unknown[]) => {
    errors.push(args.join(" "));
  };
  try {
    await fn();
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
  return { logs, errors };
};

export interface TempHome {
  dir: string;
  restore: () => Promise<void>;
}

const ENV_KEYS = ["REQDECK_HOME", "REQDECK_DEBUG", "REQDECK_RUN_LOGS", "REQDECK_TIMEOUT_MS", "REQDECK_SCRIPT_COMMAND"];

/** Points the data directory at a fresh temp dir and clears the other REQDECK_* settings. */
export const useTempHome = async (): Promise<TempHome> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "reqdeck-cli-"));
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) delete process.env[key];
  process.env.REQDECK_HOME = dir;
  return {
    dir,
    restore: async () => {
      for (const [key, value] of saved) {
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
};

export interface FetchCall {
  url: string;
  init?: RequestInit;
}

export interface FetchStub {
  calls: FetchCall[];
  restore: () => void;
}

export const stubFetch = (respond: () => Response): FetchStub => {
  const originalFetch = globalThis.fetch;
  const calls: FetchCall[] = [];
  globalThis.fetch = async (input, init) => {
    calls.push({ url: input.toString(), init });
    return respond();
  };
  return {
    calls,
    restore: () => {
      globalThis.fetch = originalFetch;
    },
  };
};
