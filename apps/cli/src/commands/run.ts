import type { BotConfig } from "@cursor-bin/core";
import { checkCommand } from "./check.js";
import { updateCommand } from "./update.js";

export interface RunCommandOptions {
  recipe: string;
  output: string;
}

/** `check` followed by `update`, sharing one decision file. */
export async function runCommand(options: RunCommandOptions, config: BotConfig): Promise<number> {
  const checked = await checkCommand(options, config);
  if (checked !== 0) {
    return checked;
  }
  return updateCommand({ recipe: options.recipe, checkOutput: options.output }, config);
}
