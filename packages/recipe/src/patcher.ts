import { COMPANION_SHA512, COMPANION_SOURCE_PREFIX, type RecipePatch } from "@cursor-bin/core";

export const COMMIT_PROVENANCE = "# sed'ded at GitHub WF";

/** Indentation of continuation entries in the checksum array. */
const CHECKSUM_INDENT = " ".repeat("sha512sums=(".length);

const SOURCE_RE = /^source=\(\s*(?:"[^"]*"|'[^']*'|[^\s)]+)?(.*)$/;
const OPEN_SOURCE_RE = /^source=\(\s*$/;
const ENTRY_RE = /^(\s*)(?:"[^"]*"|'[^']*'|[^\s)]+)(.*)$/;
const ELECTRON_RE = /^(\s*)_electron=/;

function closesArray(line: string): boolean {
  return line.trimEnd().endsWith(")");
}

function rewriteSource(line: string, url: string): string {
  const rest = SOURCE_RE.exec(line)?.[1] ?? "";
  return `source=("${url}"${rest}`;
}

/** First entry of a source array opened on the previous line. */
function rewriteSourceEntry(line: string, url: string): string[] {
  const trimmed = line.trim();
  if (trimmed.startsWith(")") || trimmed.startsWith(COMPANION_SOURCE_PREFIX)) {
    const indent = /^\s*/.exec(line)?.[0] ?? "";
    return [`${indent || "  "}"${url}"`, line];
  }
  const entry = ENTRY_RE.exec(line);
  return [entry ? `${entry[1]}"${url}"${entry[2]}` : line];
}

/**
 * Rewrite the version, pkgrel, commit, primary source, checksums and
 * Electron tag of a recipe in one pass. Every other line is returned as-is.
 *
 * The checksum array always comes out with two entries: the artifact's
 * sha512 followed by the companion script's fixed checksum.
 *
 * @throws When the source or checksum array is never closed.
 */
export function patchRecipeLines(lines: readonly string[], patch: RecipePatch): string[] {
  const out: string[] = [];
  const companion = `${CHECKSUM_INDENT}'${COMPANION_SHA512}')`;
  let inChecksums = false;
  let sourceEntryPending = false;

  for (const rawLine of lines) {
    const eol = rawLine.endsWith("\r") ? "\r" : "";
    const line = eol ? rawLine.slice(0, -1) : rawLine;

    if (inChecksums) {
      // Old entries are dropped until the array closes
      if (closesArray(line)) {
        out.push(companion + eol);
        inChecksums = false;
      }
      continue;
    }

    if (sourceEntryPending) {
      if (line.trim() === "") {
        out.push(rawLine);
        continue;
      }
      out.push(...rewriteSourceEntry(line, patch.downloadUrl).map((rewritten) => rewritten + eol));
      sourceEntryPending = false;
      continue;
    }

    if (line.startsWith("pkgver=")) {
      out.push(`pkgver=${patch.version}${eol}`);
    } else if (line.startsWith("pkgrel=")) {
      out.push(`pkgrel=${patch.rel}${eol}`);
    } else if (line.startsWith("_commit=")) {
      out.push(`_commit=${patch.commit} ${COMMIT_PROVENANCE}${eol}`);
    } else if (OPEN_SOURCE_RE.test(line)) {
      out.push(rawLine);
      sourceEntryPending = true;
    } else if (line.startsWith("source=")) {
      out.push(rewriteSource(line, patch.downloadUrl) + eol);
    } else if (line.startsWith(COMPANION_SOURCE_PREFIX)) {
      out.push(rawLine);
    } else if (line.startsWith("sha512sums=")) {
      out.push(`sha512sums=('${patch.sha512}'${eol}`);
      if (closesArray(line)) {
        out.push(companion + eol);
      } else {
        inChecksums = true;
      }
    } else {
      const electron = ELECTRON_RE.exec(line);
      out.push(electron ? `${electron[1]}_electron=${patch.electron}${eol}` : rawLine);
    }
  }

  if (inChecksums) {
    throw new Error("Unterminated sha512sums array");
  }
  if (sourceEntryPending) {
    throw new Error("Unterminated source array");
  }
  return out;
}

/** Text form of {@link patchRecipeLines}; keeps the trailing newline, if any. */
export function patchRecipe(text: string, patch: RecipePatch): string {
  return patchRecipeLines(text.split("\n"), patch).join("\n");
}
