import { buildDescriptor, parseRequestArgs, requestFlagsUsage } from "../request/RequestArgs.js";
import { formatAliasLines } from "../../render/LibraryFormat.js";
import { withLibrary } from "./LibrarySession.js";

/* eslint-disable no-console */

const saveUsage = `Usage: reqdeck save <alias> -u <URL> [-c <collection>] [-m <METHOD>] [-H <JSON|@file>] [-d <JSON|@file>] [--auth "<type> <value>"]

Saves a request as a global alias, or into a collection with -c.

${requestFlagsUsage}`;

const aliasesUsage = `Usage: reqdeck aliases [-c <collection>] [-a <alias>] [--delete <alias>]

Lists global aliases, or the aliases of one collection with -c.`;

const collectionsUsage = `Usage: reqdeck collections [<collection>] [--delete <collection>]`;

export interface AliasListArgs {
  collection?: string;
  alias?: string;
  remove?: string;
  help: boolean;
  positionals: string[];
}

export const parseAliasListArgs = (argv: string[]): AliasListArgs => {
  const parsed: AliasListArgs = { help: false, positionals: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      i += 1;
      return value;
    };
    switch (arg) {
      case "-c":
      case "--collection":
        parsed.collection = takeValue();
        break;
      case "-a":
      case "--alias":
        parsed.alias = takeValue();
        break;
      case "--delete":
      case "--remove":
        parsed.remove = takeValue();
        break;
      case "-h":
      case "--help":
        parsed.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown flag: ${arg}`);
        }
        parsed.positionals.push(arg);
        break;
    }
  }
  return parsed;
};

const scopeLabel = (name: string, collection?: string): string =>
  collection ? `alias '${name}' in collection '${collection}'` : `global alias '${name}'`;

export class AliasCommands {
  static async runSave(argv: string[]): Promise<void> {
    const args = parseRequestArgs(argv);
    if (args.help) {
      console.log(saveUsage);
      return;
    }
    const name = args.alias ?? args.positionals[0];
    if (!name) {
      throw new Error(`Missing alias name\n\n${saveUsage}`);
    }
    const descriptor = await buildDescriptor(args);
    const saved = await withLibrary((library) => library.saveAlias(name, descriptor, args.collection));
    console.log(`Saved ${scopeLabel(saved.name, saved.collection)}.`);
  }

  static async runAliases(argv: string[]): Promise<void> {
    const args = parseAliasListArgs(argv);
    if (args.help) {
      console.log(aliasesUsage);
      return;
    }
    await withLibrary(async (library) => {
      if (args.remove) {
        await library.deleteAlias(args.remove, args.collection);
        console.log(`Deleted ${scopeLabel(args.remove, args.collection)}.`);
        return;
      }
      if (args.alias) {
        console.log(formatAliasLines(args.alias, await library.resolveAlias(args.alias, args.collection)).join("\n"));
        return;
      }
      const aliases = await library.listAliases(args.collection);
      if (aliases.length === 0) {
        console.log(args.collection ? `No aliases in collection '${args.collection}'.` : "No global aliases saved.");
        return;
      }
      console.log(args.collection ? `Collection: ${args.collection}` : "Global Aliases:");
      for (const alias of aliases) {
        console.log(formatAliasLines(alias.name, alias.request).join("\n"));
      }
    });
  }

  static async runCollections(argv: string[]): Promise<void> {
    const args = parseAliasListArgs(argv);
    if (args.help) {
      console.log(collectionsUsage);
      return;
    }
    await withLibrary(async (library) => {
      if (args.remove) {
        const removed = await library.deleteCollection(args.remove);
        console.log(`Collection '${args.remove}' deleted (${removed} aliases).`);
        return;
      }
      const only = args.collection ?? args.positionals[0];
      const collections = (await library.listCollections()).filter((entry) => !only || entry.name === only);
      if (collections.length === 0) {
        console.log(only ? `Collection '${only}' not found.` : "No collections saved.");
        return;
      }
      for (const collection of collections) {
        console.log(`Collection: ${collection.name} (${collection.aliasCount} aliases)`);
        for (const alias of await library.listAliases(collection.name)) {
          console.log(formatAliasLines(alias.name, alias.request).map((line) => `  ${line}`).join("\n"));
        }
      }
    });
  }
}
