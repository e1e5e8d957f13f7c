import { createLogger } from "@cursor-bin/logger";
import { getDebUrl, type DecisionRecord } from "@cursor-bin/core";
import { deriveElectronTag } from "@cursor-bin/artifact";
import { patchRecipe } from "@cursor-bin/recipe";
import { computeSha512, downloadArtifact } from "./downloader.js";
import type { UpdateRecipeOptions } from "./types.js";

const log = createLogger("updater:recipe");

/**
 * Produce the patched recipe text for a decision.
 *
 * The .deb is downloaded once; its bytes feed both the checksum and the
 * Electron tag lookup. Nothing is written here, so a failed download
 * leaves the recipe on disk untouched.
 *
 * @throws When the artifact cannot be downloaded.
 */
export async function updateRecipe(
  recipeText: string,
  decision: DecisionRecord,
  options: UpdateRecipeOptions = {},
): Promise<string> {
  const { version, rel, commit } = decision.next;
  const downloadUrl = getDebUrl(commit, version);

  const artifact = await downloadArtifact(downloadUrl, options.downloadTimeoutMs);
  const sha512 = computeSha512(artifact);
  log.debug(`Calculated .deb SHA512: ${sha512}`);

  const derive = options.deriveElectron ?? ((bytes: Uint8Array) => deriveElectronTag(bytes, options.resolve));
  const electron = await derive(artifact);
  log.debug(`Electron tag: ${electron}`);

  const patched = patchRecipe(recipeText, { version, rel, commit, downloadUrl, sha512, electron });
  log.info(`PKGBUILD updated to version ${version} (release ${rel}) with commit ${commit}`);
  return patched;
}
