import { ConfigLoader, HistoryService, LibraryService, type Prompter } from "@reqdeck/core";
import { ReadlinePrompter } from "../../render/ReadlinePrompter.js";

/* eslint-disable no-console */

const usage = `Usage: reqdeck reset [--yes]

Deletes every saved alias, collection, template, variable and history entry, and turns debug
mode off. Asks for confirmation unless --yes (or --force) is given.`;

export interface ResetArgs {
  yes: boolean;
  help: boolean;
}

export const parseResetArgs = (argv: string[]): ResetArgs => {
  const args: ResetArgs = { yes: false, help: false };
  for (const arg of argv) {
    if (arg === "-y" || arg === "--yes" || arg === "--force") {
      args.yes = true;
    } else if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}\n\n${usage}`);
    }
  }
  return args;
};

export class ResetCommand {
  static async run(argv: string[], prompter: Prompter = new ReadlinePrompter()): Promise<void> {
    const args = parseResetArgs(argv);
    if (args.help) {
      console.log(usage);
      return;
    }
    if (
      !args.yes &&
      !(await prompter.confirm("Are you sure you want to reset all saved data? This cannot be undone. (y/N): "))
    ) {
      console.log("Reset cancelled.");
      return;
    }
    const config = await ConfigLoader.load();
    const library = await LibraryService.create(config.dataDir);
    const history = await HistoryService.create(config.dataDir);
    try {
      const cleared = await library.clearAll();
      const entries = await history.count();
      await history.clear();
      await ConfigLoader.setDebug(false, config.dataDir);
      console.log(
        `All saved data has been reset: ${cleared.aliases} aliases, ${cleared.templates} templates, ${cleared.variables} variables, ${entries} history entries.`,
      );
    } finally {
      await history.close();
      await library.close();
    }
  }
}
