import { createLogger } from "@cursor-bin/logger";
import { writeCheckOutput, type BotConfig } from "@cursor-bin/core";
import { detectUpdate, fetchReferenceSnapshot, fetchReleaseMetadata, readLocalSnapshot } from "@cursor-bin/updater";
import { appendGithubOutput } from "../github-output.js";

const log = createLogger("cli:check");

export interface CheckCommandOptions {
  recipe: string;
  output: string;
}

/** Compare the local recipe with upstream and write the decision file. */
export async function checkCommand(options: CheckCommandOptions, config: BotConfig): Promise<number> {
  log.debug(`Commit-based updates: ${config.commitBasedUpdates}`);

  const local = await readLocalSnapshot(options.recipe);
  if (!local.ok) {
    log.error(local.error);
    return 1;
  }

  const latest = await fetchReleaseMetadata({ timeoutMs: config.timeouts.metadataMs });
  if (!latest.ok) {
    log.error(latest.error);
    return 1;
  }

  const aur = await fetchReferenceSnapshot({ timeoutMs: config.timeouts.referenceRecipeMs });

  const decision = detectUpdate({ local: local.value, latest: latest.value, aur }, config);
  if (!decision.ok) {
    return 1;
  }

  const output = await writeCheckOutput(options.output, decision.value);
  if (config.githubOutput) {
    await appendGithubOutput(config.githubOutput, {
      update_needed: String(output.update_needed),
      check_output: JSON.stringify(output),
    });
  }

  const { next } = decision.value;
  if (decision.value.updateNeeded) {
    log.info(`Update available: ${local.value.version}-${local.value.rel} -> ${next.version}-${next.rel}`);
  } else {
    log.info(`Up to date at ${next.version}-${next.rel}`);
  }
  return 0;
}
