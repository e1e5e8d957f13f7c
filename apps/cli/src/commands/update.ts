import { readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createLogger } from "@cursor-bin/logger";
import { formatError, readCheckOutput, type BotConfig, type DecisionRecord } from "@cursor-bin/core";
import { updateRecipe, type UpdateRecipeOptions } from "@cursor-bin/updater";
import { findMissingAssets } from "../assets.js";

const log = createLogger("cli:update");

export interface UpdateCommandOptions {
  recipe: string;
  checkOutput: string;
}

/**
 * Apply a decision file to the recipe. The recipe is written only after
 * the download and every derived value are in hand.
 */
export async function updateCommand(
  options: UpdateCommandOptions,
  config: BotConfig,
  overrides: UpdateRecipeOptions = {},
): Promise<number> {
  let decision: DecisionRecord;
  try {
    decision = await readCheckOutput(options.checkOutput);
  } catch (error) {
    log.error(`Cannot read ${options.checkOutput}: ${formatError(error)}`);
    return 1;
  }

  if (!decision.updateNeeded && !decision.manualRelUpdate) {
    log.info("No update needed.");
    return 0;
  }

  const missing = await findMissingAssets(dirname(options.recipe));
  for (const file of missing) {
    log.error(`Required file missing: ${file}`);
  }
  if (missing.length > 0) {
    return 1;
  }

  try {
    const current = await readFile(options.recipe, "utf-8");
    const patched = await updateRecipe(current, decision, {
      downloadTimeoutMs: config.timeouts.artifactMs,
      resolve: {
        commandTimeoutMs: config.timeouts.commandMs,
        downloadTimeoutMs: config.timeouts.sourceArchiveMs,
      },
      ...overrides,
    });
    await writeFile(options.recipe, patched, "utf-8");
  } catch (error) {
    log.error(`Failed to update ${options.recipe}: ${formatError(error)}`);
    return 1;
  }
  return 0;
}
