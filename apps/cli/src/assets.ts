import { access } from "node:fs/promises";
import { join } from "node:path";
import { REQUIRED_PACKAGE_FILES } from "@cursor-bin/core";

/** Packaging assets expected beside the recipe that are not there. */
export async function findMissingAssets(dir: string): Promise<string[]> {
  const missing: string[] = [];
  for (const file of REQUIRED_PACKAGE_FILES) {
    try {
      await access(join(dir, file));
    } catch {
      missing.push(file);
    }
  }
  return missing;
}
