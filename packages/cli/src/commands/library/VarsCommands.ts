import { withLibrary } from "./LibrarySession.js";

/* eslint-disable no-console */

const usage = `Usage: reqdeck vars [list]
       reqdeck vars set <name> <value>
       reqdeck vars remove <name>
       reqdeck vars clear

Saved variables fill {{name}} placeholders in methods, URLs, headers, bodies and auth.`;

export type VarsAction =
  | { kind: "list" }
  | { kind: "set"; name: string; value: string }
  | { kind: "remove"; name: string }
  | { kind: "clear" }
  | { kind: "help" };

export const parseVarsArgs = (argv: string[]): VarsAction => {
  const [action = "list", ...rest] = argv;
  switch (action) {
    case "list":
      return { kind: "list" };
    case "set": {
      const [name, ...value] = rest;
      if (!name || value.length === 0) {
        throw new Error(`vars set needs a name and a value\n\n${usage}`);
      }
      return { kind: "set", name, value: value.join(" ") };
    }
    case "remove":
    case "rm":
      if (!rest[0]) {
        throw new Error(`vars remove needs a name\n\n${usage}`);
      }
      return { kind: "remove", name: rest[0] };
    case "clear":
      return { kind: "clear" };
    case "--help":
    case "-h":
      return { kind: "help" };
    default:
      throw new Error(`Unknown vars action: ${action}\n\n${usage}`);
  }
};

export class VarsCommands {
  static async run(argv: string[]): Promise<void> {
    const action = parseVarsArgs(argv);
    if (action.kind === "help") {
      console.log(usage);
      return;
    }
    await withLibrary(async (library) => {
      switch (action.kind) {
        case "set":
          await library.setVariable(action.name, action.value);
          console.log(`Variable '${action.name}' set.`);
          return;
        case "remove":
          await library.removeVariable(action.name);
          console.log(`Variable '${action.name}' removed.`);
          return;
        case "clear": {
          const removed = await library.clearVariables();
          console.log(removed > 0 ? `All variables cleared (${removed}).` : "No variables to clear.");
          return;
        }
        case "list": {
          const entries = Object.entries(await library.listVariables());
          if (entries.length === 0) {
            console.log("No variables saved.");
            return;
          }
          for (const [name, value] of entries) {
            console.log(`${name} = ${value}`);
          }
        }
      }
    });
  }
}
