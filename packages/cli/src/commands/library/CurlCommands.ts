import { exportCurl, quoteShellWord } from "@reqdeck/core";
import { withLibrary } from "./LibrarySession.js";

/* eslint-disable no-console */

const importUsage = `Usage: reqdeck import-curl "<curl command>" -a <alias> [-c <collection>]`;
const exportUsage = `Usage: reqdeck export-curl <alias> [-c <collection>]`;

export interface CurlArgs {
  alias?: string;
  collection?: string;
  help: boolean;
  /** Everything that is not one of our flags, in order. */
  words: string[];
}

/**
 * Only `-a`, `-c` and `--help` are taken; every other word belongs to the curl command, so an
 * unquoted `curl -X POST ...` still reaches the converter intact.
 */
export const parseCurlArgs = (argv: string[]): CurlArgs => {
  const parsed: CurlArgs = { help: false, words: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if ((arg === "-a" || arg === "--alias" || arg === "-c" || arg === "--collection") && i + 1 < argv.length) {
      if (arg === "-a" || arg === "--alias") parsed.alias = argv[i + 1];
      else parsed.collection = argv[i + 1];
      i += 1;
    } else if (arg === "--help") {
      parsed.help = true;
    } else {
      parsed.words.push(arg);
    }
  }
  return parsed;
};

/** One word is taken as the whole command line; several are re-quoted and joined. */
export const curlCommandFrom = (words: string[]): string =>
  words.length === 1 ? words[0] : words.map(quoteShellWord).join(" ");

export class CurlCommands {
  static async runImport(argv: string[]): Promise<void> {
    const args = parseCurlArgs(argv);
    if (args.help) {
      console.log(importUsage);
      return;
    }
    if (args.words.length === 0) {
      throw new Error(`Missing cURL command\n\n${importUsage}`);
    }
    const { alias } = args;
    if (!alias) {
      throw new Error(`Alias required for import\n\n${importUsage}`);
    }
    const saved = await withLibrary((library) =>
      library.importCurlAlias(curlCommandFrom(args.words), alias, args.collection),
    );
    console.log(
      saved.collection
        ? `Imported cURL as '${saved.name}' in collection '${saved.collection}'.`
        : `Imported cURL as global alias '${saved.name}'.`,
    );
  }

  static async runExport(argv: string[]): Promise<void> {
    const args = parseCurlArgs(argv);
    if (args.help) {
      console.log(exportUsage);
      return;
    }
    const alias = args.alias ?? args.words[0];
    if (!alias) {
      throw new Error(`Missing alias\n\n${exportUsage}`);
    }
    const request = await withLibrary((library) => library.resolveAlias(alias, args.collection));
    console.log(exportCurl(request));
  }
}
