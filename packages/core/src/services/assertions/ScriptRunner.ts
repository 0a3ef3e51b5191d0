import { spawnSync } from "node:child_process";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";

export const SCRIPT_IDS = [1, 2, 3, 4, 5] as const;

export interface ScriptRunResult {
  scriptId: number;
  path: string;
  found: boolean;
  exitCode?: number | null;
}

export interface ScriptRunner {
  run(scriptId: number): ScriptRunResult;
}

export interface LocalScriptRunnerOptions {
  scriptsDir: string;
  command?: string;
  extension?: string;
}

const stubFor = (scriptId: number): string =>
  `// Script ${scriptId}: runs after an assertion that names it passes.\nconsole.log("Script ${scriptId} executed.");\n`;

/** Runs `<scriptsDir>/<id>.<ext>` with the configured interpreter and waits for it to exit. */
export class LocalScriptRunner implements ScriptRunner {
  private readonly command: string;
  private readonly extension: string;

  constructor(private readonly options: LocalScriptRunnerOptions) {
    this.command = options.command ?? process.execPath;
    this.extension = options.extension ?? "js";
  }

  scriptPath(scriptId: number): string {
    return path.join(this.options.scriptsDir, `${scriptId}.${this.extension}`);
  }

  /** Creates the scripts directory with placeholder scripts for ids that have none. */
  ensureStubs(): string[] {
    mkdirSync(this.options.scriptsDir, { recursive: true });
    const created: string[] = [];
    for (const scriptId of SCRIPT_IDS) {
      const target = this.scriptPath(scriptId);
      if (existsSync(target)) continue;
      writeFileSync(target, stubFor(scriptId), "utf8");
      created.push(target);
    }
    return created;
  }

  run(scriptId: number): ScriptRunResult {
    const target = this.scriptPath(scriptId);
    if (!existsSync(target)) {
      return { scriptId, path: target, found: false };
    }
    const result = spawnSync(this.command, [target], { stdio: "inherit" });
    if (result.error) {
      throw result.error;
    }
    return { scriptId, path: target, found: true, exitCode: result.status };
  }
}
