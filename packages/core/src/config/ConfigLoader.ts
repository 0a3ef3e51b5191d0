import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { PathHelper } from "@reqdeck/shared";
import { DEFAULT_TIMEOUT_MS } from "../services/transport/FetchTransport.js";

export interface ScriptsConfig {
  command: string;
  extension: string;
}

export interface LoggingConfig {
  runLogs: boolean;
}

export interface ReqdeckConfig {
  dataDir: string;
  debug: boolean;
  timeoutMs: number;
  scripts: ScriptsConfig;
  logging: LoggingConfig;
}

export interface ConfigSource {
  debug?: boolean;
  timeoutMs?: number;
  scripts?: Partial<ScriptsConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  dataDir?: string;
}

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${label}: expected boolean.`);
};

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return value;
};

const normalizeBooleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${label}: expected boolean.`);
  }
  return value;
};

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`Invalid ${label}: expected non-empty string.`);
  }
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

const readSection = (value: unknown, label: string): Record<string, unknown> => {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  return value;
};

const readRawConfigFile = async (configPath: string): Promise<Record<string, unknown>> => {
  if (!existsSync(configPath)) return {};
  const content = await readFile(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${configPath}: expected a JSON object.`);
  }
  return parsed;
};

const normalizeFileConfig = (raw: Record<string, unknown>): ConfigSource => {
  const scripts = readSection(raw.scripts, "config.scripts");
  const logging = readSection(raw.logging, "config.logging");
  return {
    debug: normalizeBooleanField(raw.debug, "config.debug"),
    timeoutMs: normalizeNumberField(raw.timeoutMs, "config.timeoutMs"),
    scripts: {
      command: normalizeStringField(scripts.command, "config.scripts.command"),
      extension: normalizeStringField(scripts.extension, "config.scripts.extension"),
    },
    logging: {
      runLogs: normalizeBooleanField(logging.runLogs, "config.logging.runLogs"),
    },
  };
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => ({
  debug: parseBooleanStrict(env.REQDECK_DEBUG, "REQDECK_DEBUG"),
  timeoutMs: parseNumberStrict(env.REQDECK_TIMEOUT_MS, "REQDECK_TIMEOUT_MS"),
  scripts: { command: env.REQDECK_SCRIPT_COMMAND || undefined },
  logging: { runLogs: parseBooleanStrict(env.REQDECK_RUN_LOGS, "REQDECK_RUN_LOGS") },
});

const mergeConfigs = (base: ReqdeckConfig, ...sources: Array<ConfigSource | undefined>): ReqdeckConfig => {
  const merged: ReqdeckConfig = { ...base, scripts: { ...base.scripts }, logging: { ...base.logging } };
  for (const source of sources) {
    if (!source) continue;
    if (source.debug !== undefined) merged.debug = source.debug;
    if (source.timeoutMs !== undefined) merged.timeoutMs = source.timeoutMs;
    if (source.scripts?.command !== undefined) merged.scripts.command = source.scripts.command;
    if (source.scripts?.extension !== undefined) merged.scripts.extension = source.scripts.extension;
    if (source.logging?.runLogs !== undefined) merged.logging.runLogs = source.logging.runLogs;
  }
  return merged;
};

const assertValid = (config: ReqdeckConfig): void => {
  if (config.timeoutMs <= 0) {
    throw new Error("Invalid timeoutMs: expected a positive number.");
  }
};

/**
 * Settings come from defaults, then `config.json` in the data directory, then `REQDECK_*`
 * environment variables, then command-line flags.
 */
export class ConfigLoader {
  static defaults(dataDir: string): ReqdeckConfig {
    return {
      dataDir,
      debug: false,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      scripts: { command: process.execPath, extension: "js" },
      logging: { runLogs: false },
    };
  }

  static async load(options: LoadConfigOptions = {}): Promise<ReqdeckConfig> {
    const env = options.env ?? process.env;
    const dataDir = options.dataDir ?? PathHelper.getDataDir(env);
    const fileConfig = normalizeFileConfig(await readRawConfigFile(PathHelper.getConfigPath(dataDir)));
    const merged = mergeConfigs(ConfigLoader.defaults(dataDir), fileConfig, loadEnvConfig(env), options.cli);
    assertValid(merged);
    return merged;
  }

  /** Persists the debug toggle, keeping every other key of `config.json`. */
  static async setDebug(enabled: boolean, dataDir: string = PathHelper.getDataDir()): Promise<void> {
    const configPath = PathHelper.getConfigPath(dataDir);
    const raw = await readRawConfigFile(configPath);
    await PathHelper.ensureDir(dataDir);
    await writeFile(configPath, `${JSON.stringify({ ...raw, debug: enabled }, null, 2)}\n`, "utf8");
  }
}
