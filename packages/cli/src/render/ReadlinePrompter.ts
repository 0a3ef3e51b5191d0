import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import type { Prompter } from "@reqdeck/core";

const question = async (prompt: string): Promise<string> => {
  const rl = readline.createInterface({ input, output });
  try {
    return await rl.question(prompt);
  } finally {
    rl.close();
  }
};

export class ReadlinePrompter implements Prompter {
  async confirm(message: string): Promise<boolean> {
    const answer = await question(message);
    return /^y(es)?$/i.test(answer.trim());
  }

  async ask(message: string): Promise<string> {
    return (await question(message)).trim();
  }
}
