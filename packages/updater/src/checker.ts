import { readFile } from "node:fs/promises";
import { z } from "zod/v4";
import { createLogger } from "@cursor-bin/logger";
import {
  AUR_RECIPE_URL,
  BROWSER_USER_AGENT,
  DEFAULT_TIMEOUTS,
  UPDATE_API_URL,
  err,
  extractCommitFromUrl,
  formatError,
  getDebUrl,
  ok,
  sleep,
  type RecipeSnapshot,
  type ReleaseMetadata,
  type Result,
} from "@cursor-bin/core";
import { readRecipeSnapshot } from "@cursor-bin/recipe";
import type { ReferenceFetchOptions, ReleaseFetchOptions } from "./types.js";

const log = createLogger("updater:checker");

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 5000;

const updateResponseSchema = z.object({
  version: z.string().min(1),
  url: z.string().min(1),
});

async function requestReleaseMetadata(url: string, timeoutMs: number): Promise<ReleaseMetadata> {
  log.debug(`Making request to: ${url}`);
  const response = await fetch(url, {
    headers: {
      "User-Agent": BROWSER_USER_AGENT,
      Accept: "application/json",
      "Cache-Control": "no-cache",
    },
    signal: AbortSignal.timeout(timeoutMs),
  });
  const body = await response.text();
  log.debug(`API status code: ${response.status}`);
  log.debug(`API raw response: ${body}`);

  if (response.status !== 200 || body.trim() === "") {
    throw new Error(`Invalid response from update API: HTTP ${response.status}`);
  }

  const payload = updateResponseSchema.safeParse(JSON.parse(body));
  if (!payload.success) {
    throw new Error("Update API response is missing version or url");
  }

  const commit = extractCommitFromUrl(payload.data.url);
  if (!commit) {
    throw new Error("Failed to extract commit from update URL");
  }

  return { version: payload.data.version, commit, downloadUrl: getDebUrl(commit, payload.data.version) };
}

/**
 * Fetch the latest release from the update API.
 * Retries with a fixed delay; never throws.
 */
export async function fetchReleaseMetadata(options: ReleaseFetchOptions = {}): Promise<Result<ReleaseMetadata>> {
  const url = options.url ?? UPDATE_API_URL;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUTS.metadataMs;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const release = await requestReleaseMetadata(url, timeoutMs);
      log.debug(`Extracted version: ${release.version}, commit: ${release.commit}`);
      log.debug(`Constructed download URL: ${release.downloadUrl}`);
      return ok(release);
    } catch (error) {
      log.warn(`Request failed: ${formatError(error)}`);
    }

    if (attempt < maxRetries) {
      log.debug(`Retrying in ${retryDelayMs}ms...`);
      await sleep(retryDelayMs);
    }
  }

  log.error("Failed to get release metadata after all retry attempts");
  return err("Failed to get latest commit and version after retries");
}

/**
 * Fetch the published recipe and read its snapshot.
 * Returns null on any failure; the reference is only used to spot manual bumps.
 */
export async function fetchReferenceSnapshot(options: ReferenceFetchOptions = {}): Promise<RecipeSnapshot | null> {
  const url = options.url ?? AUR_RECIPE_URL;
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUTS.referenceRecipeMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    const snapshot = readRecipeSnapshot(await response.text());
    if (!snapshot) {
      log.warn("Unable to find version, release, or commit in AUR PKGBUILD");
    }
    return snapshot;
  } catch (error) {
    log.warn(`Error fetching AUR PKGBUILD: ${formatError(error)}`);
    return null;
  }
}

/** Read the snapshot of the recipe on disk. */
export async function readLocalSnapshot(recipePath: string): Promise<Result<RecipeSnapshot>> {
  let text: string;
  try {
    text = await readFile(recipePath, "utf-8");
  } catch (error) {
    return err(`Cannot read ${recipePath}: ${formatError(error)}`);
  }

  const snapshot = readRecipeSnapshot(text);
  if (!snapshot) {
    return err(`Unable to find current version, release, or commit in ${recipePath}`);
  }
  return ok(snapshot);
}
