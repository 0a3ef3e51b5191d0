import { ConfigLoader, LibraryService } from "@reqdeck/core";
import type { RequestDescriptor } from "@reqdeck/shared";
import { applyExitCode, withExecutor } from "./ExecutorSession.js";
import { buildDescriptor, parseRequestArgs, requestFlagsUsage, type RequestArgs } from "./RequestArgs.js";

const requestUsage = `Usage: reqdeck request -u <URL> [options]

${requestFlagsUsage}`;

const sendUsage = `Usage: reqdeck send <alias> [-c <collection>] [options]

Sends a saved alias. --auth replaces the alias's saved auth for this call.

${requestFlagsUsage}`;

const resolveSendDescriptor = async (args: RequestArgs, dataDir: string): Promise<RequestDescriptor> => {
  const alias = args.alias ?? args.positionals[0];
  if (!alias) {
    throw new Error(`Missing alias\n\n${sendUsage}`);
  }
  const library = await LibraryService.create(dataDir);
  try {
    return await library.resolveAlias(alias, args.collection);
  } finally {
    await library.close();
  }
};

export class RequestCommand {
  /** `reqdeck request`: build a request from flags, or from `-a` when an alias is given. */
  static async run(argv: string[]): Promise<void> {
    const args = parseRequestArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(requestUsage);
      return;
    }
    if (args.alias) {
      await RequestCommand.send(args);
      return;
    }
    const config = await ConfigLoader.load();
    const descriptor = await buildDescriptor(args);
    const summary = await withExecutor(config, (executor) => executor.execute(descriptor, args.options), args.saveVars);
    applyExitCode([summary]);
  }

  static async runSend(argv: string[]): Promise<void> {
    const args = parseRequestArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(sendUsage);
      return;
    }
    await RequestCommand.send(args);
  }

  private static async send(args: RequestArgs): Promise<void> {
    const config = await ConfigLoader.load();
    const descriptor = await resolveSendDescriptor(args, config.dataDir);
    const options = args.auth === undefined ? args.options : { ...args.options, authOverride: args.auth };
    const summary = await withExecutor(config, (executor) => executor.execute(descriptor, options), args.saveVars);
    applyExitCode([summary]);
  }
}
