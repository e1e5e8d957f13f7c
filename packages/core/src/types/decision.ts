import type { RecipeSnapshot } from "./recipe.js";
import type { ReleaseMetadata } from "./release.js";

export type UpdateMode = "commit" | "version";

/** Outcome of comparing the local recipe against upstream. */
export interface DecisionRecord {
  /** Upstream changed in a way the recipe must follow */
  updateNeeded: boolean;
  /**
   * The local pkgrel was bumped by hand past the published one
   * (same version and commit). The recipe is already correct.
   */
  manualRelUpdate: boolean;
  local: RecipeSnapshot;
  latest: ReleaseMetadata;
  /** Published reference recipe, null when it could not be fetched */
  aur: RecipeSnapshot | null;
  /** What the recipe should describe after this run */
  next: RecipeSnapshot;
}

/** Fallback mode saw the same version under a different commit. */
export interface DetectionConflict {
  kind: "version-conflict";
  message: string;
  local: RecipeSnapshot;
  latest: ReleaseMetadata;
}
