import { ConfigLoader } from "@reqdeck/core";
import type { ExecuteOptions, StoredTemplate } from "@reqdeck/shared";
import { applyExitCode, withExecutor } from "../request/ExecutorSession.js";
import { buildDescriptor, parseRequestArgs, requestFlagsUsage, type RequestArgs } from "../request/RequestArgs.js";
import { formatTemplateLines } from "../../render/LibraryFormat.js";
import { withLibrary } from "./LibrarySession.js";

/* eslint-disable no-console */

const usage = `Usage: reqdeck template save <name> -u <URL> [options]
       reqdeck template list
       reqdeck template use <name> [options]
       reqdeck template delete <name>

A template keeps a request and the options it is sent with. "use" previews the
request, asks for confirmation and sends it; options given on the command line
replace the saved ones.

${requestFlagsUsage}`;

export type TemplateAction = "save" | "list" | "use" | "delete";

export interface TemplateArgs {
  action: TemplateAction | "help";
  name?: string;
  request: RequestArgs;
}

const ACTIONS: readonly string[] = ["save", "list", "use", "delete"];

const isTemplateAction = (value: string): value is TemplateAction => ACTIONS.includes(value);

export const parseTemplateArgs = (argv: string[]): TemplateArgs => {
  const [action = "list", ...rest] = argv;
  const request = parseRequestArgs(rest);
  if (action === "--help" || action === "-h" || request.help) {
    return { action: "help", request };
  }
  if (!isTemplateAction(action)) {
    throw new Error(`Unknown template action: ${action}\n\n${usage}`);
  }
  const name = request.positionals[0];
  if (action !== "list" && !name) {
    throw new Error(`template ${action} needs a name\n\n${usage}`);
  }
  return { action, name, request };
};

/** Saved options first, then the ones given for this call. */
export const mergeTemplateOptions = (template: StoredTemplate, args: RequestArgs): ExecuteOptions => {
  const options: ExecuteOptions = { ...template.options, ...args.options, preview: true };
  if (args.auth !== undefined) options.authOverride = args.auth;
  return options;
};

export class TemplateCommands {
  static async run(argv: string[]): Promise<void> {
    const args = parseTemplateArgs(argv);
    const name = args.name ?? "";
    switch (args.action) {
      case "help":
        console.log(usage);
        return;
      case "save": {
        const descriptor = await buildDescriptor(args.request);
        await withLibrary((library) => library.saveTemplate(name, descriptor, args.request.options));
        console.log(`Template '${name}' saved.`);
        return;
      }
      case "list":
        await withLibrary(async (library) => {
          const templates = await library.listTemplates();
          if (templates.length === 0) {
            console.log("No templates saved.");
            return;
          }
          for (const template of templates) {
            console.log(formatTemplateLines(template).join("\n"));
          }
        });
        return;
      case "delete":
        await withLibrary((library) => library.deleteTemplate(name));
        console.log(`Template '${name}' deleted.`);
        return;
      case "use": {
        const template = await withLibrary((library) => library.getTemplate(name));
        const config = await ConfigLoader.load();
        const options = mergeTemplateOptions(template, args.request);
        const summary = await withExecutor(
          config,
          (executor) => executor.execute(template.request, options),
          args.request.saveVars,
        );
        applyExitCode([summary]);
      }
    }
  }
}
