import { createLogger } from "@cursor-bin/logger";
import {
  err,
  formatError,
  ok,
  type DecisionRecord,
  type DetectionConflict,
  type RecipeSnapshot,
  type Result,
} from "@cursor-bin/core";
import { isNewerVersion } from "./version.js";
import type { DetectionInput, DetectionSettings } from "./types.js";

const log = createLogger("updater:detector");

/**
 * A manual pkgrel bump: the published recipe builds the same version and
 * commit as the local one, but the local pkgrel is higher.
 */
export function isManualRelUpdate(local: RecipeSnapshot, aur: RecipeSnapshot | null): boolean {
  return aur !== null && aur.version === local.version && aur.commit === local.commit && local.rel > aur.rel;
}

function isStrictlyNewer(current: string, latest: string): boolean {
  try {
    return isNewerVersion(current, latest);
  } catch (error) {
    log.warn(`Invalid version format: ${formatError(error)}`);
    return false;
  }
}

/**
 * Decide whether the recipe must follow upstream and what it should
 * describe afterwards.
 *
 * Commit mode follows every new upstream commit: pkgrel resets to 1 on a
 * version change and increments for a rebuild of the same version. A new
 * commit takes precedence over a manual bump seen at the same time.
 *
 * Version mode only follows version changes. The same version under a new
 * commit is reported as a conflict, since pkgrel cannot be chosen safely.
 */
export function detectUpdate(
  { local, latest, aur }: DetectionInput,
  settings: DetectionSettings,
): Result<DecisionRecord, DetectionConflict> {
  const manualRelUpdate = isManualRelUpdate(local, aur);
  const commitChanged = latest.commit !== local.commit;
  const unchanged = { manualRelUpdate, local, latest, aur, updateNeeded: false, next: { ...local } };

  log.debug(`Local version: ${local.version}, release: ${local.rel}, commit: ${local.commit}`);
  log.debug(`Latest version: ${latest.version}, commit: ${latest.commit}`);
  log.debug(aur ? `AUR version: ${aur.version}, release: ${aur.rel}, commit: ${aur.commit}` : "AUR snapshot unavailable");
  log.debug(`Manual release update: ${manualRelUpdate}`);

  if (settings.commitBasedUpdates) {
    log.debug(`Commit update needed: ${commitChanged}`);
    if (!commitChanged) {
      if (manualRelUpdate) log.debug("Keeping manually bumped pkgrel");
      return ok(unchanged);
    }

    const versionChanged = latest.version !== local.version;
    const rel = versionChanged ? 1 : local.rel + 1;
    log.debug(versionChanged ? "New version, resetting pkgrel" : `Same version with new commit, pkgrel ${local.rel} -> ${rel}`);
    return ok({
      ...unchanged,
      updateNeeded: true,
      next: { version: latest.version, rel, commit: latest.commit },
    });
  }

  log.debug(`Version protection enabled: ${settings.versionProtection}`);
  const versionChanged =
    latest.version !== local.version && (!settings.versionProtection || isStrictlyNewer(local.version, latest.version));
  log.debug(`Version update needed: ${versionChanged}`);

  if (versionChanged) {
    return ok({
      ...unchanged,
      updateNeeded: true,
      next: { version: latest.version, rel: 1, commit: latest.commit },
    });
  }

  if (commitChanged && latest.version === local.version) {
    const message = "Fallback mode detected same version with different commit; pkgrel needs manual adjustment";
    log.error(message);
    log.error(`Current: version=${local.version}, commit=${local.commit}`);
    log.error(`Latest: version=${latest.version}, commit=${latest.commit}`);
    return err({ kind: "version-conflict", message, local, latest });
  }

  if (commitChanged) {
    log.warn(`Ignoring upstream ${latest.version}: not newer than ${local.version}`);
  }
  return ok(unchanged);
}
