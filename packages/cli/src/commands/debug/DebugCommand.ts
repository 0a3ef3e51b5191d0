import { ConfigLoader } from "@reqdeck/core";

/* eslint-disable no-console */

const usage = `Usage: reqdeck debug [on|off|toggle|status]

Debug mode unlocks --mock, --dry-run, --no-history, --repeat, --interval and --verbose.`;

export type DebugAction = "on" | "off" | "toggle" | "status";

export const parseDebugArgs = (argv: string[]): DebugAction | "help" => {
  const [action = "status"] = argv;
  switch (action) {
    case "on":
    case "off":
    case "toggle":
    case "status":
      return action;
    case "-h":
    case "--help":
      return "help";
    default:
      throw new Error(`Unknown debug action: ${action}\n\n${usage}`);
  }
};

export class DebugCommand {
  static async run(argv: string[]): Promise<void> {
    const action = parseDebugArgs(argv);
    if (action === "help") {
      console.log(usage);
      return;
    }
    const config = await ConfigLoader.load();
    let enabled = config.debug;
    if (action !== "status") {
      enabled = action === "toggle" ? !config.debug : action === "on";
      await ConfigLoader.setDebug(enabled, config.dataDir);
    }
    console.log(`Debug mode is ${enabled ? "ON" : "OFF"}`);
  }
}
