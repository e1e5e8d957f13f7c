import { createHash } from "node:crypto";
import { createLogger } from "@cursor-bin/logger";
import { DEFAULT_TIMEOUTS } from "@cursor-bin/core";

const log = createLogger("updater:downloader");

/**
 * Download a release artifact into memory.
 *
 * @throws On network error, timeout or non-ok response.
 */
export async function downloadArtifact(url: string, timeoutMs = DEFAULT_TIMEOUTS.artifactMs): Promise<Buffer> {
  log.info(`Downloading ${url}`);

  const response = await fetch(url, {
    redirect: "follow",
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`Download failed: HTTP ${response.status} ${response.statusText}`);
  }

  const data = Buffer.from(await response.arrayBuffer());
  log.debug(`Download completed, ${data.byteLength} bytes`);
  return data;
}

/** SHA-512 of a buffer, lowercase hex. */
export function computeSha512(data: Uint8Array): string {
  return createHash("sha512").update(data).digest("hex");
}
