import { readFile } from "node:fs/promises";
import { createLogger } from "@cursor-bin/logger";
import { formatError, type ValidationCheck, type ValidationReport } from "@cursor-bin/core";

const log = createLogger("validator:checks");

/** Values the recipe is expected to carry. Unset fields are only format-checked. */
export interface RecipeExpectations {
  version?: string;
  rel?: number;
  commit?: string;
  electron?: string;
  sha512?: string;
}

type Outcome = { pass: boolean; message: string };

interface FieldRule {
  name: string;
  label: string;
  read: RegExp;
  format: RegExp;
  expected: (e: RecipeExpectations) => string | undefined;
}

// Read with patterns of our own so a patcher bug cannot hide itself
const FIELD_RULES: FieldRule[] = [
  {
    name: "version",
    label: "Version",
    read: /^pkgver=(\S*)/m,
    format: /^\d+\.\d+\.\d+$/,
    expected: (e) => e.version,
  },
  {
    name: "pkgrel",
    label: "pkgrel",
    read: /^pkgrel=(\S*)/m,
    format: /^[1-9]\d*$/,
    expected: (e) => (e.rel === undefined ? undefined : String(e.rel)),
  },
  {
    name: "commit",
    label: "Commit hash",
    read: /^_commit=(\S*)/m,
    format: /^[0-9a-f]{40}$/,
    expected: (e) => e.commit,
  },
  {
    name: "electron",
    label: "Electron version",
    read: /^\s*_electron=(\S*)/m,
    format: /^electron\d+$/,
    expected: (e) => e.electron,
  },
  {
    name: "checksum",
    label: "SHA512 checksum",
    read: /^sha512sums=\(\s*['"]?([^'"\s)]*)/m,
    format: /^[0-9a-f]{128}$/,
    expected: (e) => e.sha512,
  },
];

function checkField(content: string, rule: FieldRule, expectations: RecipeExpectations): Outcome {
  const actual = rule.read.exec(content)?.[1];
  if (!actual) {
    return { pass: false, message: `${rule.label} is missing` };
  }
  if (!rule.format.test(actual)) {
    return { pass: false, message: `${rule.label} has an invalid format: ${actual}` };
  }
  const expected = rule.expected(expectations);
  if (expected !== undefined && actual !== expected) {
    return { pass: false, message: `${rule.label} is ${actual}, expected ${expected}` };
  }
  return { pass: true, message: `${rule.label} is ${actual}` };
}

const TITLEBAR_FIX_RE = /sed -i.*l\.frame=!1.*native.*titlebar/is;

function checkTitlebarFix(content: string): Outcome {
  if (TITLEBAR_FIX_RE.test(content)) {
    return { pass: true, message: "Native titlebar fix is present" };
  }
  if (content.includes("Fix native title bar")) {
    return { pass: true, message: "Native titlebar fix comment found" };
  }
  return { pass: false, message: "Native titlebar fix is missing" };
}

function checkDebFormat(content: string): Outcome {
  return content.includes(".deb") && !content.includes("AppImage")
    ? { pass: true, message: "Using .deb format (not AppImage)" }
    : { pass: false, message: "Not using .deb format or still references AppImage" };
}

function checkExtraction(content: string): Outcome {
  return content.includes("bsdtar -xf data.tar.xz")
    ? { pass: true, message: "Using bsdtar for .deb extraction" }
    : { pass: false, message: "Not using bsdtar for .deb extraction" };
}

function checkBinaryLink(content: string): Outcome {
  return content.includes('ln -sf /usr/share/cursor/cursor "$pkgdir"/usr/bin/cursor')
    ? { pass: true, message: "Binary symlink is correct" }
    : { pass: false, message: "Binary symlink is missing or incorrect" };
}

function toCheck(name: string, outcome: Outcome): ValidationCheck {
  log.debug(`${name}: ${outcome.pass ? "pass" : "fail"} (${outcome.message})`);
  return { name, status: outcome.pass ? "pass" : "fail", message: outcome.message, advisory: false };
}

/**
 * Run every check against recipe text. Checks do not short-circuit; the
 * report is successful when no load-bearing check failed.
 */
export function validateRecipe(content: string, expectations: RecipeExpectations = {}): ValidationReport {
  const checks: ValidationCheck[] = [
    ...FIELD_RULES.map((rule) => toCheck(rule.name, checkField(content, rule, expectations))),
    toCheck("titlebar_fix", checkTitlebarFix(content)),
    toCheck("deb_format", checkDebFormat(content)),
    toCheck("extraction", checkExtraction(content)),
    toCheck("binary_link", checkBinaryLink(content)),
  ];

  return {
    validationSuccessful: checks.every((check) => check.advisory || check.status === "pass"),
    checks,
    errors: [],
    recipeContent: content,
  };
}

/** Read and validate a recipe file. An unreadable file yields a failed report. */
export async function validateRecipeFile(
  path: string,
  expectations: RecipeExpectations = {},
): Promise<ValidationReport> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    const missing = error instanceof Error && "code" in error && error.code === "ENOENT";
    const message = missing ? `Recipe not found: ${path}` : `Validation error: ${formatError(error)}`;
    log.error(message);
    return { validationSuccessful: false, checks: [], errors: [message], recipeContent: "" };
  }
  return validateRecipe(content, expectations);
}
