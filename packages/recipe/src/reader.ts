import type { RecipeFields, RecipeSnapshot } from "@cursor-bin/core";

const VERSION_RE = /^pkgver=(.+)$/m;
const REL_RE = /^pkgrel=(\d+)/m;
const COMMIT_RE = /^_commit=([a-f0-9]+)/m;
const ELECTRON_RE = /^\s*_electron=(\S+)/m;
const ARRAY_ENTRY_RE = /'([^']*)'|"([^"]*)"|([^\s'"]+)/g;

/**
 * Read version, pkgrel and commit from recipe text.
 * Returns null when any of the three is missing or pkgrel is not positive.
 */
export function readRecipeSnapshot(text: string): RecipeSnapshot | null {
  const version = VERSION_RE.exec(text)?.[1].trim();
  const rel = REL_RE.exec(text)?.[1];
  const commit = COMMIT_RE.exec(text)?.[1];
  if (!version || rel === undefined || !commit) return null;

  const relNumber = Number(rel);
  if (relNumber < 1) return null;
  return { version, rel: relNumber, commit };
}

/** Entries of a bash array assignment such as `sha512sums=(...)`, in order. */
export function readArray(text: string, name: string): string[] {
  const match = new RegExp(`^${name}=\\(([^)]*)\\)`, "m").exec(text);
  if (!match) return [];

  const entries: string[] = [];
  for (const entry of match[1].matchAll(ARRAY_ENTRY_RE)) {
    entries.push(entry[1] ?? entry[2] ?? entry[3]);
  }
  return entries;
}

export function readRecipeFields(text: string): RecipeFields | null {
  const snapshot = readRecipeSnapshot(text);
  if (!snapshot) return null;
  return {
    ...snapshot,
    electron: ELECTRON_RE.exec(text)?.[1] ?? null,
    sha512sums: readArray(text, "sha512sums"),
    sources: readArray(text, "source"),
  };
}
