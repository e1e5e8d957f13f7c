import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod/v4";
import { createLogger } from "@cursor-bin/logger";
import {
  BROWSER_USER_AGENT,
  DEFAULT_TIMEOUTS,
  FALLBACK_ELECTRON,
  formatError,
  getVscodeTarballUrl,
  sleep,
} from "@cursor-bin/core";
import { runCommand, type CommandRunner } from "./command.js";
import { extractInnerVersion } from "./introspector.js";
import { withScratchDir } from "./scratch.js";

const log = createLogger("artifact:electron");

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 2000;

// Lockfile v1: { dependencies: { electron: { version } } }
const rootDependencySchema = z.object({
  dependencies: z.object({ electron: z.object({ version: z.string() }) }),
});

// Lockfile v2/v3: { packages: { "": { dependencies, devDependencies } } }
const rootPackageSchema = z.object({
  packages: z.object({
    "": z.object({
      dependencies: z.record(z.string(), z.unknown()).optional(),
      devDependencies: z.record(z.string(), z.unknown()).optional(),
    }),
  }),
});

const installedPackageSchema = z.object({
  packages: z.object({ "node_modules/electron": z.object({ version: z.string() }) }),
});

type LookupStrategy = { name: string; find: (lock: unknown) => string | null };

const strategies: LookupStrategy[] = [
  {
    name: "root dependencies",
    find: (lock) => {
      const parsed = rootDependencySchema.safeParse(lock);
      return parsed.success ? parsed.data.dependencies.electron.version : null;
    },
  },
  {
    name: "root package dependencies",
    find: (lock) => {
      const parsed = rootPackageSchema.safeParse(lock);
      if (!parsed.success) return null;
      const root = parsed.data.packages[""];
      const direct = root.dependencies?.electron;
      if (typeof direct === "string") return direct;
      const dev = root.devDependencies?.electron;
      return typeof dev === "string" ? dev : null;
    },
  },
  {
    name: "node_modules/electron",
    find: (lock) => {
      const parsed = installedPackageSchema.safeParse(lock);
      return parsed.success ? parsed.data.packages["node_modules/electron"].version : null;
    },
  },
];

/** Find the Electron version pinned by a package-lock.json document. */
export function findElectronVersion(lock: unknown): string | null {
  for (const strategy of strategies) {
    const version = strategy.find(lock);
    if (version) {
      log.debug(`Found electron ${version} via ${strategy.name}`);
      return version;
    }
  }
  return null;
}

/** "34.2.0" → "electron34". Range operators such as "^" are skipped. */
export function electronTagFromVersion(version: string): string | null {
  const major = /^\D*(\d+)/.exec(version.split(".")[0]);
  return major ? `electron${major[1]}` : null;
}

export interface ResolveOptions {
  run?: CommandRunner;
  commandTimeoutMs?: number;
  downloadTimeoutMs?: number;
  /** Extra attempts after the first one. Default: 3 */
  maxRetries?: number;
  /** Fixed delay between attempts. Default: 2000 */
  retryDelayMs?: number;
}

async function fetchElectronTag(vscodeVersion: string, options: ResolveOptions): Promise<string> {
  const url = getVscodeTarballUrl(vscodeVersion);
  log.debug(`Downloading VS Code tarball ${url}`);

  const response = await fetch(url, {
    headers: { "User-Agent": BROWSER_USER_AGENT },
    redirect: "follow",
    signal: AbortSignal.timeout(options.downloadTimeoutMs ?? DEFAULT_TIMEOUTS.sourceArchiveMs),
  });
  if (!response.ok) {
    throw new Error(`Tarball download failed: HTTP ${response.status} ${response.statusText}`);
  }
  const tarball = Buffer.from(await response.arrayBuffer());

  return withScratchDir("vscode-src", async (dir) => {
    const tarballPath = join(dir, "vscode.tar.gz");
    const lockPath = `vscode-${vscodeVersion}/package-lock.json`;
    await writeFile(tarballPath, tarball);

    await (options.run ?? runCommand)("tar", ["-xzf", tarballPath, lockPath], {
      cwd: dir,
      timeoutMs: options.commandTimeoutMs ?? DEFAULT_TIMEOUTS.commandMs,
    });

    const lock: unknown = JSON.parse(await readFile(join(dir, lockPath), "utf-8"));
    const version = findElectronVersion(lock);
    if (!version) {
      throw new Error("Electron dependency not found in package-lock.json");
    }
    const tag = electronTagFromVersion(version);
    if (!tag) {
      throw new Error(`Unrecognised electron version "${version}"`);
    }
    return tag;
  });
}

/**
 * Resolve the Electron tag ("electron34") for a VS Code release by reading
 * the package-lock.json of its source archive.
 *
 * Never throws: after the last failed attempt the fallback tag is returned.
 */
export async function resolveElectronTag(vscodeVersion: string, options: ResolveOptions = {}): Promise<string> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const tag = await fetchElectronTag(vscodeVersion, options);
      log.debug(`Determined Electron version: ${tag}`);
      return tag;
    } catch (error) {
      log.warn(`Failed to get Electron version (attempt ${attempt + 1}/${maxRetries + 1}): ${formatError(error)}`);
      if (attempt < maxRetries) {
        log.debug(`Retrying in ${retryDelayMs}ms...`);
        await sleep(retryDelayMs);
      }
    }
  }

  log.warn(`Could not determine Electron version, using fallback ${FALLBACK_ELECTRON}`);
  return FALLBACK_ELECTRON;
}

/** Electron tag for a Cursor .deb: introspect the package, then resolve. */
export async function deriveElectronTag(artifact: Uint8Array, options: ResolveOptions = {}): Promise<string> {
  const vscodeVersion = await extractInnerVersion(artifact, options);
  if (!vscodeVersion) {
    log.warn(`Could not determine VS Code version, using fallback ${FALLBACK_ELECTRON}`);
    return FALLBACK_ELECTRON;
  }
  log.debug(`VS Code version determined: ${vscodeVersion}`);
  return resolveElectronTag(vscodeVersion, options);
}
