import type { BotConfig, RecipeSnapshot, ReleaseMetadata } from "@cursor-bin/core";
import type { ResolveOptions } from "@cursor-bin/artifact";

export interface ReleaseFetchOptions {
  /** Override the update API URL */
  url?: string;
  /** Per-request timeout. Default: 15s */
  timeoutMs?: number;
  /** Extra attempts after the first one. Default: 2 */
  maxRetries?: number;
  /** Fixed delay between attempts. Default: 5000 */
  retryDelayMs?: number;
}

export interface ReferenceFetchOptions {
  url?: string;
  timeoutMs?: number;
}

export interface DetectionInput {
  local: RecipeSnapshot;
  latest: ReleaseMetadata;
  /** Published recipe; null when it could not be fetched */
  aur: RecipeSnapshot | null;
}

export type DetectionSettings = Pick<BotConfig, "commitBasedUpdates" | "versionProtection">;

export interface UpdateRecipeOptions {
  /** Timeout for the .deb download. Default: 60s */
  downloadTimeoutMs?: number;
  /** Options for the Electron tag resolution */
  resolve?: ResolveOptions;
  /** Replace the introspect-and-resolve step, e.g. in tests */
  deriveElectron?: (artifact: Uint8Array) => Promise<string>;
}
