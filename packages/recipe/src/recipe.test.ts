import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { COMPANION_SHA512, getDebUrl, type RecipePatch } from "@cursor-bin/core";
import { readArray, readRecipeFields, readRecipeSnapshot } from "./reader.js";
import { patchRecipe, patchRecipeLines } from "./patcher.js";

const FIXTURE = readFileSync(fileURLToPath(new URL("../../../fixtures/PKGBUILD", import.meta.url)), "utf-8");

const OLD_COMMIT = "1".repeat(40);
const NEW_COMMIT = "2".repeat(40);
const SHA = "c".repeat(128);
const COMPANION_LINE = `            '${COMPANION_SHA512}')`;

const patch: RecipePatch = {
  version: "1.0.1",
  rel: 1,
  commit: NEW_COMMIT,
  downloadUrl: getDebUrl(NEW_COMMIT, "1.0.1"),
  sha512: SHA,
  electron: "electron34",
};

// ---------------------------------------------------------------------------
// reader
// ---------------------------------------------------------------------------
describe("readRecipeSnapshot", () => {
  it("reads version, pkgrel and commit", () => {
    expect(readRecipeSnapshot(FIXTURE)).toEqual({ version: "1.0.0", rel: 2, commit: OLD_COMMIT });
  });

  it("ignores the provenance comment after the commit", () => {
    const text = `pkgver=2.0.0\npkgrel=1\n_commit=${NEW_COMMIT} # note\n`;
    expect(readRecipeSnapshot(text)?.commit).toBe(NEW_COMMIT);
  });

  it("returns null when a field is missing", () => {
    expect(readRecipeSnapshot("pkgver=1.0.0\npkgrel=1\n")).toBeNull();
    expect(readRecipeSnapshot(`pkgrel=1\n_commit=${OLD_COMMIT}\n`)).toBeNull();
  });

  it("returns null for pkgrel=0", () => {
    expect(readRecipeSnapshot(`pkgver=1.0.0\npkgrel=0\n_commit=${OLD_COMMIT}\n`)).toBeNull();
  });
});

describe("readRecipeFields", () => {
  it("reads arrays and the electron tag", () => {
    const fields = readRecipeFields(FIXTURE);
    expect(fields?.electron).toBe("electron30");
    expect(fields?.sha512sums).toEqual(["a".repeat(128), "b".repeat(128)]);
    expect(fields?.sources).toEqual([
      getDebUrl(OLD_COMMIT, "1.0.0"),
      "https://gitlab.archlinux.org/archlinux/packaging/packages/code/-/raw/1.100.3-1/code.sh",
    ]);
  });
});

describe("readArray", () => {
  it("handles single-line arrays and bare words", () => {
    expect(readArray("options=(!strip !debug)\n", "options")).toEqual(["!strip", "!debug"]);
  });

  it("returns an empty list for an unknown array", () => {
    expect(readArray(FIXTURE, "md5sums")).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// patcher
// ---------------------------------------------------------------------------
describe("patchRecipe", () => {
  it("rewrites the managed fields of the fixture", () => {
    const lines = patchRecipe(FIXTURE, patch).split("\n");
    expect(lines).toContain("pkgver=1.0.1");
    expect(lines).toContain("pkgrel=1");
    expect(lines).toContain(`_commit=${NEW_COMMIT} # sed'ded at GitHub WF`);
    expect(lines).toContain(`source=("${getDebUrl(NEW_COMMIT, "1.0.1")}"`);
    expect(lines).toContain(
      "https://gitlab.archlinux.org/archlinux/packaging/packages/code/-/raw/1.100.3-1/code.sh)",
    );
    expect(lines).toContain(`sha512sums=('${SHA}'`);
    expect(lines).toContain(COMPANION_LINE);
    expect(lines).toContain("  _electron=electron34");
  });

  it("keeps every other line verbatim and in order", () => {
    const before = FIXTURE.split("\n");
    const after = patchRecipe(FIXTURE, patch).split("\n");
    expect(after).toHaveLength(before.length);
    const managed = /^(pkgver=|pkgrel=|_commit=|source=|sha512sums=|\s+'|\s*_electron=)/;
    before.forEach((line, i) => {
      if (!managed.test(line)) expect(after[i]).toBe(line);
    });
  });

  it("is idempotent", () => {
    const once = patchRecipe(FIXTURE, patch);
    expect(patchRecipe(once, patch)).toBe(once);
  });

  it("produces exactly two checksums whatever the array held before", () => {
    const text = [
      "sha512sums=('1'",
      "            '2'",
      "            '3'",
      "            '4')",
      "# after",
    ].join("\n");
    expect(patchRecipeLines(text.split("\n"), patch)).toEqual([
      `sha512sums=('${SHA}'`,
      COMPANION_LINE,
      "# after",
    ]);
    expect(readArray(patchRecipe(text, patch), "sha512sums")).toEqual([SHA, COMPANION_SHA512]);
  });

  it("expands a single-line checksum array without swallowing later lines", () => {
    const lines = ["sha512sums=('x')", "pkgdesc='kept'"];
    expect(patchRecipeLines(lines, patch)).toEqual([`sha512sums=('${SHA}'`, COMPANION_LINE, "pkgdesc='kept'"]);
  });

  it("replaces only the first entry of a single-line source array", () => {
    const lines = ["source=('old.deb' 'other.sh')"];
    expect(patchRecipeLines(lines, patch)).toEqual([`source=("${patch.downloadUrl}" 'other.sh')`]);
  });

  it("preserves CRLF line endings", () => {
    const text = "pkgver=0.1.0\r\npkgrel=4\r\n# keep\r\n";
    expect(patchRecipe(text, patch)).toBe("pkgver=1.0.1\r\npkgrel=1\r\n# keep\r\n");
  });

  it("keeps the indentation of the electron assignment", () => {
    expect(patchRecipeLines(["_electron=electron1", "    _electron=electron2"], patch)).toEqual([
      "_electron=electron34",
      "    _electron=electron34",
    ]);
  });

  it("replaces the first entry of a source array that opens on its own line", () => {
    const lines = ["source=(", '  "https://old.example/cursor_0.9_amd64.deb"', "  code.sh", ")"];
    expect(patchRecipeLines(lines, patch)).toEqual(["source=(", `  "${patch.downloadUrl}"`, "  code.sh", ")"]);
    expect(readArray(patchRecipe(lines.join("\n"), patch), "source")).toEqual([patch.downloadUrl, "code.sh"]);
  });

  it("inserts the download URL before the companion script when the open array has no .deb entry", () => {
    const companion = "  https://gitlab.archlinux.org/code.sh";
    const lines = ["source=(", companion, ")"];
    const once = patchRecipeLines(lines, patch);
    expect(once).toEqual(["source=(", `  "${patch.downloadUrl}"`, companion, ")"]);
    expect(patchRecipeLines(once, patch)).toEqual(once);
  });

  it("throws on a checksum array that never closes", () => {
    const lines = ["sha512sums=('a'", "  'b'", "package() {", "  ln -sf x", "}"];
    expect(() => patchRecipeLines(lines, patch)).toThrow("Unterminated sha512sums array");
  });

  it("throws on a source array that never gets an entry", () => {
    expect(() => patchRecipeLines(["source=(", ""], patch)).toThrow("Unterminated source array");
  });
});
