import { rmSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger } from "@cursor-bin/logger";
import { formatError } from "@cursor-bin/core";

const log = createLogger("artifact:scratch");

const liveDirs = new Set<string>();

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withScratchDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
  liveDirs.add(dir);
  log.debug(`Created scratch directory ${dir}`);
  try {
    return await fn(dir);
  } finally {
    liveDirs.delete(dir);
    await rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
      log.warn(`Failed to remove scratch directory ${dir}: ${formatError(error)}`);
    });
  }
}

/** Scratch directories currently in use. */
export function liveScratchDirs(): string[] {
  return [...liveDirs];
}

/**
 * Synchronously remove every scratch directory still in use.
 * Meant for signal handlers, where awaiting is not an option.
 */
export function cleanupScratchDirs(): string[] {
  const removed: string[] = [];
  for (const dir of liveDirs) {
    try {
      rmSync(dir, { recursive: true, force: true });
      removed.push(dir);
    } catch (error) {
      log.warn(`Failed to remove scratch directory ${dir}: ${formatError(error)}`);
    }
  }
  liveDirs.clear();
  return removed;
}
