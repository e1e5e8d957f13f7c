/** The fields that identify what a recipe currently builds. */
export interface RecipeSnapshot {
  version: string;
  /** pkgrel, always a positive integer */
  rel: number;
  commit: string;
}

/** Everything the bot reads from a recipe. */
export interface RecipeFields extends RecipeSnapshot {
  /** Value of `_electron=`, e.g. "electron34" */
  electron: string | null;
  /** Entries of the `sha512sums=(...)` array, in order */
  sha512sums: string[];
  /** Entries of the `source=(...)` array, in order */
  sources: string[];
}

/** Values the patcher writes into a recipe. */
export interface RecipePatch extends RecipeSnapshot {
  downloadUrl: string;
  sha512: string;
  electron: string;
}
