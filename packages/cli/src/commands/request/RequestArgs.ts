import { readFile } from "node:fs/promises";
import {
  createInvalidInputError,
  describeError,
  isDisplayFilter,
  toHeaderMap,
  toJsonValue,
  type ExecuteOptions,
  type HeaderMap,
  type JsonValue,
  type RequestDescriptor,
} from "@reqdeck/shared";

export interface RequestArgs {
  method?: string;
  url?: string;
  /** Raw `-H` value: inline JSON or `@file`. */
  headers?: string;
  /** Raw `-d` value: inline JSON or `@file`. */
  data?: string;
  auth?: string;
  alias?: string;
  collection?: string;
  saveVars: boolean;
  help: boolean;
  options: ExecuteOptions;
  positionals: string[];
}

export const requestFlagsUsage = `  -m, --method <METHOD>        HTTP method (default GET)
  -u, --url <URL|FILE>         URL, or a file with one URL per line
  -H, --headers <JSON|@file>   request headers
  -d, --data <JSON|@file>      request body
  -o, --output <FILE>          write the response report to a file
  --only <body|headers|status> print only this part of the response
  --auth "<type> <value>"      bearer <token> or basic <user:pass>
  --assert <COND[,SCRIPT]>     status=<code> or body_contains=<text>, optional script 1-5
  -p, --preview                show the request and confirm before sending
  --fill-vars                  prompt for variables that are not saved
  --save-vars                  save the values entered at those prompts
  --dry-run                    [debug] preview without sending
  --mock                       [debug] answer with a random mock response
  --no-history                 [debug] do not record history
  -r, --repeat <N>             [debug] send N times per target
  -i, --interval <MS>          [debug] wait between repeats
  -v, --verbose                [debug] print the full exchange`;

const VALUE_FLAGS = new Set([
  "-m",
  "--method",
  "-u",
  "--url",
  "-H",
  "--headers",
  "-d",
  "--data",
  "-o",
  "--output",
  "--only",
  "--auth",
  "--assert",
  "-r",
  "--repeat",
  "-i",
  "--interval",
  "-a",
  "--alias",
  "-c",
  "--collection",
]);

const parseInteger = (value: string, flag: string, minimum: number): number => {
  if (!/^\d+$/.test(value.trim()) || Number.parseInt(value, 10) < minimum) {
    throw new Error(`Invalid ${flag}: expected an integer >= ${minimum}.`);
  }
  return Number.parseInt(value, 10);
};

/** Parses the request flags shared by `request`, `send`, `save` and `template save`. */
export const parseRequestArgs = (argv: string[]): RequestArgs => {
  const parsed: RequestArgs = { saveVars: false, help: false, options: {}, positionals: [] };
  const { options } = parsed;
  for (let i = 0; i < argv.length; i += 1) {
    let arg = argv[i];
    let inline: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 2) {
      inline = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }
    let value = "";
    if (VALUE_FLAGS.has(arg)) {
      const next = inline ?? argv[i + 1];
      if (next === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      value = next;
      if (inline === undefined) i += 1;
    }
    switch (arg) {
      case "-m":
      case "--method":
        parsed.method = value;
        break;
      case "-u":
      case "--url":
        parsed.url = value;
        break;
      case "-H":
      case "--headers":
        parsed.headers = value;
        break;
      case "-d":
      case "--data":
        parsed.data = value;
        break;
      case "-o":
      case "--output":
        options.outputFile = value;
        break;
      case "--only":
        if (!isDisplayFilter(value)) {
          throw new Error(`Invalid --only: expected body, headers or status.`);
        }
        options.displayFilter = value;
        break;
      case "--auth":
        parsed.auth = value;
        break;
      case "--assert":
        options.assertion = value;
        break;
      case "-r":
      case "--repeat":
        options.repeat = parseInteger(value, "--repeat", 1);
        break;
      case "-i":
      case "--interval":
        options.intervalMs = parseInteger(value, "--interval", 0);
        break;
      case "-a":
      case "--alias":
        parsed.alias = value;
        break;
      case "-c":
      case "--collection":
        parsed.collection = value;
        break;
      case "-p":
      case "--preview":
        options.preview = true;
        break;
      case "--fill-vars":
        options.fillVariables = true;
        break;
      case "--save-vars":
        parsed.saveVars = true;
        break;
      case "--no-history":
        options.skipHistory = true;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--mock":
        options.mock = true;
        break;
      case "-v":
      case "--verbose":
        options.verbose = true;
        break;
      case "-h":
      case "--help":
        parsed.help = true;
        break;
      default:
        if (arg.startsWith("-") && arg.length > 1) {
          throw new Error(`Unknown flag: ${arg}`);
        }
        parsed.positionals.push(arg);
        break;
    }
  }
  return parsed;
};

/** Reads an inline JSON argument, or the JSON file it names when it starts with `@`. */
export const readJsonArgument = async (raw: string, label: string): Promise<unknown> => {
  let text = raw;
  if (raw.startsWith("@")) {
    const file = raw.slice(1);
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      throw createInvalidInputError(`Could not read ${label} file ${file}: ${describeError(error)}`, { file });
    }
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw createInvalidInputError(`Invalid JSON for ${label}: ${describeError(error)}`);
  }
};

export const loadHeaders = async (raw: string | undefined): Promise<HeaderMap> => {
  if (raw === undefined) return {};
  const value = await readJsonArgument(raw, "headers");
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw createInvalidInputError("Headers must be a JSON object.");
  }
  return toHeaderMap(value);
};

export const loadBody = async (raw: string | undefined): Promise<JsonValue | undefined> => {
  if (raw === undefined) return undefined;
  return toJsonValue(await readJsonArgument(raw, "data"));
};

/** Builds a descriptor from `-m -u -H -d --auth`. The URL is required; the method defaults to GET. */
export const buildDescriptor = async (args: RequestArgs): Promise<RequestDescriptor> => {
  if (!args.url?.trim()) {
    throw createInvalidInputError("A URL is required (-u/--url).");
  }
  const descriptor: RequestDescriptor = {
    method: (args.method ?? "GET").toUpperCase(),
    url: args.url,
    headers: await loadHeaders(args.headers),
  };
  const body = await loadBody(args.data);
  if (body !== undefined) descriptor.body = body;
  if (args.auth !== undefined) descriptor.auth = args.auth;
  return descriptor;
};
