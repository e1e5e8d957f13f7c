import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod/v4";
import type { DecisionRecord } from "./types/decision.js";
import type { RecipeSnapshot } from "./types/recipe.js";

const relString = z.string().regex(/^[1-9]\d*$/, "must be a positive integer");

/**
 * Wire shape of the file passed from `check` to `update`.
 * Counters travel as strings so workflow expressions can compare them.
 */
export const checkOutputSchema = z.object({
  update_needed: z.boolean(),
  manual_rel_update: z.boolean().default(false),
  local_version: z.string(),
  local_rel: relString,
  local_commit: z.string(),
  download_url: z.string(),
  new_version: z.string(),
  new_rel: relString,
  new_commit: z.string(),
  latest_version: z.string(),
  latest_commit: z.string(),
  aur_version: z.string().nullable(),
  aur_rel: relString.nullable(),
  aur_commit: z.string().nullable(),
});

export type CheckOutput = z.infer<typeof checkOutputSchema>;

export function toCheckOutput(decision: DecisionRecord): CheckOutput {
  return {
    update_needed: decision.updateNeeded,
    manual_rel_update: decision.manualRelUpdate,
    local_version: decision.local.version,
    local_rel: String(decision.local.rel),
    local_commit: decision.local.commit,
    download_url: decision.latest.downloadUrl,
    new_version: decision.next.version,
    new_rel: String(decision.next.rel),
    new_commit: decision.next.commit,
    latest_version: decision.latest.version,
    latest_commit: decision.latest.commit,
    aur_version: decision.aur?.version ?? null,
    aur_rel: decision.aur ? String(decision.aur.rel) : null,
    aur_commit: decision.aur?.commit ?? null,
  };
}

export function fromCheckOutput(output: CheckOutput): DecisionRecord {
  let aur: RecipeSnapshot | null = null;
  if (output.aur_version !== null && output.aur_rel !== null && output.aur_commit !== null) {
    aur = { version: output.aur_version, rel: Number(output.aur_rel), commit: output.aur_commit };
  }
  return {
    updateNeeded: output.update_needed,
    manualRelUpdate: output.manual_rel_update,
    local: { version: output.local_version, rel: Number(output.local_rel), commit: output.local_commit },
    latest: {
      version: output.latest_version,
      commit: output.latest_commit,
      downloadUrl: output.download_url,
    },
    aur,
    next: { version: output.new_version, rel: Number(output.new_rel), commit: output.new_commit },
  };
}

export async function writeCheckOutput(path: string, decision: DecisionRecord): Promise<CheckOutput> {
  const output = toCheckOutput(decision);
  await writeFile(path, JSON.stringify(output), "utf-8");
  return output;
}

/** Read and validate a check-output file. Throws on missing or malformed files. */
export async function readCheckOutput(path: string): Promise<DecisionRecord> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  return fromCheckOutput(checkOutputSchema.parse(raw));
}
