import { describe, it, expect, vi, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { PRODUCT_JSON_PATH } from "@cursor-bin/core";
import type { CommandRunner } from "./command.js";
import { extractInnerVersion } from "./introspector.js";
import {
  deriveElectronTag,
  electronTagFromVersion,
  findElectronVersion,
  resolveElectronTag,
} from "./electron.js";
import { cleanupScratchDirs, liveScratchDirs, withScratchDir } from "./scratch.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
}

/** Command runner that writes the files a real extraction would produce. */
function fakeRunner(outputs: Record<string, { path: string; content: string } | Error>) {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (command, args, { cwd }) => {
    calls.push({ command, args, cwd });
    const output = outputs[command];
    if (output === undefined) throw new Error(`unexpected command ${command}`);
    if (output instanceof Error) throw output;
    const target = join(cwd, output.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, output.content);
  };
  return { run, calls };
}

function debRunner(product: unknown) {
  return fakeRunner({
    ar: { path: "data.tar.xz", content: "xz" },
    tar: { path: PRODUCT_JSON_PATH, content: JSON.stringify(product) },
  });
}

function lockRunner(vscodeVersion: string, lock: unknown) {
  return fakeRunner({
    tar: { path: `vscode-${vscodeVersion}/package-lock.json`, content: JSON.stringify(lock) },
  });
}

function okResponse() {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    arrayBuffer: () => Promise.resolve(new TextEncoder().encode("tarball").buffer),
  };
}

const ARTIFACT = new TextEncoder().encode("deb-bytes");

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// findElectronVersion
// ---------------------------------------------------------------------------
describe("findElectronVersion", () => {
  it("reads a lockfile v1 root dependency", () => {
    expect(findElectronVersion({ dependencies: { electron: { version: "30.1.2" } } })).toBe("30.1.2");
  });

  it("reads the root package dependencies", () => {
    expect(findElectronVersion({ packages: { "": { dependencies: { electron: "32.0.0" } } } })).toBe("32.0.0");
  });

  it("falls back to the root package devDependencies", () => {
    const lock = { packages: { "": { dependencies: { other: "1.0.0" }, devDependencies: { electron: "34.2.0" } } } };
    expect(findElectronVersion(lock)).toBe("34.2.0");
  });

  it("reads node_modules/electron when the root package does not list it", () => {
    const lock = {
      packages: {
        "": { dependencies: { other: "1.0.0" } },
        "node_modules/electron": { version: "35.0.1" },
      },
    };
    expect(findElectronVersion(lock)).toBe("35.0.1");
  });

  it("prefers the root dependency over later strategies", () => {
    const lock = {
      dependencies: { electron: { version: "29.0.0" } },
      packages: { "node_modules/electron": { version: "35.0.1" } },
    };
    expect(findElectronVersion(lock)).toBe("29.0.0");
  });

  it("returns null when no strategy matches", () => {
    expect(findElectronVersion({ packages: { "": {} } })).toBeNull();
    expect(findElectronVersion("not a lockfile")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// electronTagFromVersion
// ---------------------------------------------------------------------------
describe("electronTagFromVersion", () => {
  it("keeps only the major version", () => {
    expect(electronTagFromVersion("34.2.0")).toBe("electron34");
  });

  it("skips range operators", () => {
    expect(electronTagFromVersion("^30.1.2")).toBe("electron30");
  });

  it("returns null without a number", () => {
    expect(electronTagFromVersion("latest")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// extractInnerVersion
// ---------------------------------------------------------------------------
describe("extractInnerVersion", () => {
  it("reads vscodeVersion from product.json", async () => {
    const { run, calls } = debRunner({ nameShort: "Cursor", vscodeVersion: "1.99.3" });
    await expect(extractInnerVersion(ARTIFACT, { run })).resolves.toBe("1.99.3");

    expect(calls.map((c) => c.command)).toEqual(["ar", "tar"]);
    expect(calls[0].args).toEqual(["x", join(calls[0].cwd, "cursor.deb"), "data.tar.xz"]);
    expect(calls[1].args).toEqual(["-xf", "data.tar.xz", PRODUCT_JSON_PATH]);
  });

  it("writes the artifact bytes for ar to read", async () => {
    let seen = "";
    const run: CommandRunner = async (command, args) => {
      if (command === "ar") seen = await readFile(args[1], "utf-8");
      throw new Error("stop");
    };
    await extractInnerVersion(ARTIFACT, { run });
    expect(seen).toBe("deb-bytes");
  });

  it("removes its scratch directory afterwards", async () => {
    const { run, calls } = debRunner({ vscodeVersion: "1.99.3" });
    await extractInnerVersion(ARTIFACT, { run });
    expect(existsSync(calls[0].cwd)).toBe(false);
    expect(liveScratchDirs()).toEqual([]);
  });

  it("returns null when a command fails", async () => {
    const { run, calls } = fakeRunner({ ar: new Error("not an ar archive") });
    await expect(extractInnerVersion(ARTIFACT, { run })).resolves.toBeNull();
    expect(existsSync(calls[0].cwd)).toBe(false);
  });

  it("returns null when vscodeVersion is missing", async () => {
    const { run } = debRunner({ nameShort: "Cursor" });
    await expect(extractInnerVersion(ARTIFACT, { run })).resolves.toBeNull();
  });

  it("returns null when product.json is not JSON", async () => {
    const { run } = fakeRunner({
      ar: { path: "data.tar.xz", content: "xz" },
      tar: { path: PRODUCT_JSON_PATH, content: "{oops" },
    });
    await expect(extractInnerVersion(ARTIFACT, { run })).resolves.toBeNull();
  });
});

// ---------------------------------------------------------------------------
// resolveElectronTag
// ---------------------------------------------------------------------------
describe("resolveElectronTag", () => {
  const lock = { packages: { "": { devDependencies: { electron: "34.3.2" } } } };

  it("downloads the tarball and reads the lockfile", async () => {
    const fetchMock = vi.fn().mockResolvedValue(okResponse());
    vi.stubGlobal("fetch", fetchMock);
    const { run, calls } = lockRunner("1.99.3", lock);

    await expect(resolveElectronTag("1.99.3", { run, retryDelayMs: 0 })).resolves.toBe("electron34");
    expect(fetchMock).toHaveBeenCalledWith(
      "https://github.com/microsoft/vscode/archive/refs/tags/1.99.3.tar.gz",
      expect.objectContaining({ redirect: "follow", signal: expect.any(AbortSignal) }),
    );
    expect(calls[0].args).toEqual([
      "-xzf",
      join(calls[0].cwd, "vscode.tar.gz"),
      "vscode-1.99.3/package-lock.json",
    ]);
  });

  it("returns the fallback after every attempt fails", async () => {
    const fetchMock = vi.fn().mockRejectedValue(new Error("ENOTFOUND"));
    vi.stubGlobal("fetch", fetchMock);

    await expect(resolveElectronTag("1.99.3", { retryDelayMs: 0 })).resolves.toBe("electron28");
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it("retries on HTTP errors and succeeds later", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce({ ok: false, status: 502, statusText: "Bad Gateway" })
      .mockResolvedValueOnce(okResponse());
    vi.stubGlobal("fetch", fetchMock);
    const { run } = lockRunner("1.99.3", lock);

    await expect(resolveElectronTag("1.99.3", { run, retryDelayMs: 0 })).resolves.toBe("electron34");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("retries when the lockfile has no electron entry", async () => {
    const fetchMock = vi.fn().mockResolvedValue(okResponse());
    vi.stubGlobal("fetch", fetchMock);
    const { run } = lockRunner("1.99.3", { packages: {} });

    await expect(resolveElectronTag("1.99.3", { run, maxRetries: 1, retryDelayMs: 0 })).resolves.toBe(
      "electron28",
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

// ---------------------------------------------------------------------------
// deriveElectronTag
// ---------------------------------------------------------------------------
describe("deriveElectronTag", () => {
  it("uses the fallback without downloading when introspection fails", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const { run } = fakeRunner({ ar: new Error("bad archive") });

    await expect(deriveElectronTag(ARTIFACT, { run })).resolves.toBe("electron28");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("chains introspection into resolution", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(okResponse()));
    const write = async (cwd: string, path: string, content: string) => {
      const target = join(cwd, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content);
    };
    // Both tar invocations go through one runner, so route by argument
    const routed: CommandRunner = async (command, args, { cwd }) => {
      if (command === "ar") {
        await write(cwd, "data.tar.xz", "xz");
      } else if (args[0] === "-xzf") {
        await write(cwd, "vscode-1.99.3/package-lock.json", JSON.stringify({ dependencies: { electron: { version: "33.4.0" } } }));
      } else {
        await write(cwd, PRODUCT_JSON_PATH, JSON.stringify({ vscodeVersion: "1.99.3" }));
      }
    };

    await expect(deriveElectronTag(ARTIFACT, { run: routed, retryDelayMs: 0 })).resolves.toBe("electron33");
  });
});

// ---------------------------------------------------------------------------
// scratch directories
// ---------------------------------------------------------------------------
describe("scratch directories", () => {
  it("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withScratchDir("test", async (dir) => {
        seen = dir;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(existsSync(seen)).toBe(false);
  });

  it("cleanupScratchDirs removes live directories synchronously", async () => {
    await withScratchDir("test", async (dir) => {
      expect(liveScratchDirs()).toEqual([dir]);
      expect(cleanupScratchDirs()).toEqual([dir]);
      expect(existsSync(dir)).toBe(false);
      expect(liveScratchDirs()).toEqual([]);
    });
  });
});
