import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";

/**
 * Resolves where reqdeck keeps its data. `REQDECK_HOME` relocates the whole tree, which is
 * also how tests isolate themselves from the user's real data.
 */
export class PathHelper {
  static getDataDir(env: NodeJS.ProcessEnv = process.env): string {
    const override = env.REQDECK_HOME?.trim();
    return override ? path.resolve(override) : path.join(os.homedir(), ".reqdeck");
  }

  static getDbPath(dataDir: string = this.getDataDir()): string {
    return path.join(dataDir, "reqdeck.db");
  }

  static getConfigPath(dataDir: string = this.getDataDir()): string {
    return path.join(dataDir, "config.json");
  }

  static getScriptsDir(dataDir: string = this.getDataDir()): string {
    return path.join(dataDir, "scripts");
  }

  static getLogsDir(dataDir: string = this.getDataDir()): string {
    return path.join(dataDir, "logs");
  }

  static async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }
}
