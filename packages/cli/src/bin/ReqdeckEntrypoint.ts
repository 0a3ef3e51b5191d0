#!/usr/bin/env node
import { createRequire } from "node:module";
import { RequestCommand } from "../commands/request/RequestCommand.js";
import { AliasCommands } from "../commands/library/AliasCommands.js";
import { CurlCommands } from "../commands/library/CurlCommands.js";
import { TemplateCommands } from "../commands/library/TemplateCommands.js";
import { TransferCommands } from "../commands/library/TransferCommands.js";
import { VarsCommands } from "../commands/library/VarsCommands.js";
import { HistoryCommands } from "../commands/history/HistoryCommands.js";
import { ChainCommand } from "../commands/chain/ChainCommand.js";
import { DebugCommand } from "../commands/debug/DebugCommand.js";
import { ResetCommand } from "../commands/reset/ResetCommand.js";

export const usage = `Usage: reqdeck <command> [...args]

Requests:
  request      build and send a request (-u, -m, -H, -d, --auth, ...)
  send         send a saved alias (send <alias> [-c <collection>])
  chain        send every request of a JSON or YAML file in order
  replay       send a history entry again
  template     save|list|use|delete request templates

Library:
  save         save a request as an alias (-c to put it in a collection)
  aliases      list, show or delete aliases
  collections  list collections or delete one
  vars         list|set|remove|clear variables
  import-curl  save a curl command as an alias
  export-curl  print an alias as a curl command
  export       export collections, aliases, variables, templates or all
  import       import a JSON or YAML export

History:
  history      list (-s, -n) or clear (--clear) history
  diff         diff two history entries or two files

Settings:
  debug        on|off|toggle|status
  reset        delete all saved data (--yes skips the confirmation)

Run "reqdeck <command> --help" for the flags of a command.`;

const readCliVersion = (): string => {
  const require = createRequire(import.meta.url);
  try {
    const pkg: unknown = require("../../package.json");
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
};

export class ReqdeckEntrypoint {
  static async run(argv: string[] = process.argv.slice(2)): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readCliVersion());
      return;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(usage);
      return;
    }
    if (!command) {
      throw new Error(usage);
    }
    if (command === "request") {
      await RequestCommand.run(rest);
      return;
    }
    if (command === "send") {
      await RequestCommand.runSend(rest);
      return;
    }
    if (command === "save") {
      await AliasCommands.runSave(rest);
      return;
    }
    if (command === "aliases") {
      await AliasCommands.runAliases(rest);
      return;
    }
    if (command === "collections") {
      await AliasCommands.runCollections(rest);
      return;
    }
    if (command === "vars") {
      await VarsCommands.run(rest);
      return;
    }
    if (command === "history") {
      await HistoryCommands.run(rest);
      return;
    }
    if (command === "replay") {
      await HistoryCommands.runReplay(rest);
      return;
    }
    if (command === "diff") {
      await HistoryCommands.runDiff(rest);
      return;
    }
    if (command === "chain") {
      await ChainCommand.run(rest);
      return;
    }
    if (command === "import-curl") {
      await CurlCommands.runImport(rest);
      return;
    }
    if (command === "export-curl") {
      await CurlCommands.runExport(rest);
      return;
    }
    if (command === "template") {
      await TemplateCommands.run(rest);
      return;
    }
    if (command === "export") {
      await TransferCommands.runExport(rest);
      return;
    }
    if (command === "import") {
      await TransferCommands.runImport(rest);
      return;
    }
    if (command === "debug") {
      await DebugCommand.run(rest);
      return;
    }
    if (command === "reset") {
      await ResetCommand.run(rest);
      return;
    }
    throw new Error(`Unknown command: ${command}`);
  }
}

if (process.argv[1] && /reqdeck(\.js)?$|ReqdeckEntrypoint\.(js|ts)$/.test(process.argv[1])) {
  ReqdeckEntrypoint.run().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
