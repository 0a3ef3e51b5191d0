import { EXPORT_TARGETS, isExportTarget, type ExportTarget } from "@reqdeck/core";
import { withLibrary } from "./LibrarySession.js";

/* eslint-disable no-console */

const exportUsage = `Usage: reqdeck export -t <${EXPORT_TARGETS.join("|")}> -f <file.json|file.yaml>`;
const importUsage = `Usage: reqdeck import -f <file.json|file.yaml>`;

export interface TransferArgs {
  target: ExportTarget;
  file?: string;
  help: boolean;
}

export const parseTransferArgs = (argv: string[]): TransferArgs => {
  const parsed: TransferArgs = { target: "all", help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-t":
      case "--target": {
        const value = argv[i + 1] ?? "";
        if (!isExportTarget(value)) {
          throw new Error(`Unknown export target: ${value}`);
        }
        parsed.target = value;
        i += 1;
        break;
      }
      case "-f":
      case "--file":
        parsed.file = argv[i + 1];
        i += 1;
        break;
      case "-h":
      case "--help":
        parsed.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new Error(`Unknown flag: ${arg}`);
        }
        parsed.file = arg;
        break;
    }
  }
  return parsed;
};

export class TransferCommands {
  static async runExport(argv: string[]): Promise<void> {
    const args = parseTransferArgs(argv);
    if (args.help) {
      console.log(exportUsage);
      return;
    }
    const { file } = args;
    if (!file) {
      throw new Error(`Missing file\n\n${exportUsage}`);
    }
    await withLibrary((library) => library.exportToFile(args.target, file));
    console.log(`Exported ${args.target} to ${file}`);
  }

  static async runImport(argv: string[]): Promise<void> {
    const args = parseTransferArgs(argv);
    if (args.help) {
      console.log(importUsage);
      return;
    }
    const { file } = args;
    if (!file) {
      throw new Error(`Missing file\n\n${importUsage}`);
    }
    const summary = await withLibrary((library) => library.importFromFile(file));
    console.log(
      `Imported from ${file}: ${summary.collections} collection aliases, ${summary.aliases} aliases, ` +
        `${summary.variables} variables, ${summary.templates} templates.`,
    );
  }
}
