import inquirer from "inquirer";
import { initialPickerState, pickerPrompt, renderPicker, transitionPicker } from "../core/picker.js";
import type { BaselineSelection, TrackedItem } from "../core/baselines.js";

export interface PromptIO {
  question(prompt: string): Promise<string>;
  write(line: string): void;
  close(): void;
}

/** Asks each question with an inquirer input prompt. */
export function createTerminalPrompt(): PromptIO {
  return {
    question: async (prompt) => {
      const answers = await inquirer.prompt([
        { type: "input", name: "answer", message: prompt.replace(/:\s*$/, "") }
      ]);
      const answer: unknown = answers.answer;
      return typeof answer === "string" ? answer : "";
    },
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
    // inquirer releases stdin after every prompt.
    close: () => undefined
  };
}

/** Runs the picker until it completes; an empty result means nothing was chosen. */
export async function promptForTitles(
  catalog: TrackedItem[],
  io: PromptIO
): Promise<BaselineSelection[]> {
  let state = initialPickerState(catalog);
  try {
    while (state.phase !== "complete") {
      for (const line of renderPicker(state)) {
        io.write(line);
      }
      state = transitionPicker(state, await io.question(pickerPrompt(state)));
    }
    for (const line of renderPicker(state)) {
      io.write(line);
    }
    return state.picked;
  } finally {
    io.close();
  }
}
