import * as clack from "@clack/prompts";
import type { ChoicePrompt } from "./select.js";
import { blank, info } from "./ui.js";

/** Prints the numbered list and reads one answer from the terminal. */
export const clackPrompt: ChoicePrompt = {
  async ask(message: string, choices: string[]): Promise<string | null> {
    blank();
    choices.forEach((choice, index) => {
      info(`  ${index + 1}. ${choice}`);
    });
    blank();

    const answer = await clack.text({ message });
    if (clack.isCancel(answer)) {
      return null;
    }
    return answer;
  },
};
