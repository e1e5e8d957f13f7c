import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod/v4";
import { createLogger } from "@cursor-bin/logger";
import { DEFAULT_TIMEOUTS, PRODUCT_JSON_PATH, formatError } from "@cursor-bin/core";
import { runCommand, type CommandRunner } from "./command.js";
import { withScratchDir } from "./scratch.js";

const log = createLogger("artifact:introspector");

/** Member of the .deb ar archive that holds the installed files. */
export const DATA_MEMBER = "data.tar.xz";

const productSchema = z.object({
  vscodeVersion: z.string().min(1),
});

export interface IntrospectOptions {
  run?: CommandRunner;
  commandTimeoutMs?: number;
}

/**
 * Read the VS Code version Cursor was built on from a .deb package:
 * `ar` pulls out data.tar.xz, `tar` pulls product.json out of that.
 *
 * Returns null instead of throwing when any step fails.
 */
export async function extractInnerVersion(
  artifact: Uint8Array,
  options: IntrospectOptions = {},
): Promise<string | null> {
  const run = options.run ?? runCommand;
  const timeoutMs = options.commandTimeoutMs ?? DEFAULT_TIMEOUTS.commandMs;

  try {
    return await withScratchDir("cursor-deb", async (dir) => {
      const debPath = join(dir, "cursor.deb");
      await writeFile(debPath, artifact);
      log.debug(`Saved artifact to ${debPath}, size: ${artifact.byteLength} bytes`);

      try {
        await run("ar", ["x", debPath, DATA_MEMBER], { cwd: dir, timeoutMs });
        await run("tar", ["-xf", DATA_MEMBER, PRODUCT_JSON_PATH], { cwd: dir, timeoutMs });

        const raw: unknown = JSON.parse(await readFile(join(dir, PRODUCT_JSON_PATH), "utf-8"));
        const product = productSchema.safeParse(raw);
        if (!product.success) {
          log.debug("vscodeVersion not found in product.json");
          return null;
        }

        log.debug(`Found VS Code version: ${product.data.vscodeVersion}`);
        return product.data.vscodeVersion;
      } finally {
        await rm(debPath, { force: true });
      }
    });
  } catch (error) {
    log.debug(`Could not read product.json from artifact: ${formatError(error)}`);
    return null;
  }
}
