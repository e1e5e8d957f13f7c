import { readFile } from "node:fs/promises";
import { createLogger } from "@cursor-bin/logger";
import { formatError, readCheckOutput, type BotConfig } from "@cursor-bin/core";
import { deriveElectronTag, type ResolveOptions } from "@cursor-bin/artifact";
import { computeSha512, downloadArtifact } from "@cursor-bin/updater";
import {
  findDownloadUrl,
  formatReportBlock,
  probeDownload,
  summarizeReport,
  validateRecipeFile,
  type RecipeExpectations,
} from "@cursor-bin/validator";

const log = createLogger("cli:validate");

export interface ValidateCommandOptions {
  recipe: string;
  expectVersion?: string;
  expectRel?: number;
  expectCommit?: string;
  expectElectron?: string;
  expectSha512?: string;
  checkOutput?: string;
  derive?: boolean;
  probe?: boolean;
}

/**
 * Download the artifact the recipe names and derive its checksum and
 * Electron tag the same way `update` does.
 */
export async function deriveExpectations(
  recipePath: string,
  config: BotConfig,
  resolve: ResolveOptions = {},
): Promise<Pick<RecipeExpectations, "electron" | "sha512">> {
  const url = findDownloadUrl(await readFile(recipePath, "utf-8"));
  if (!url) {
    throw new Error(`No .deb source URL in ${recipePath}`);
  }
  const artifact = await downloadArtifact(url, config.timeouts.artifactMs);
  const electron = await deriveElectronTag(artifact, {
    commandTimeoutMs: config.timeouts.commandMs,
    downloadTimeoutMs: config.timeouts.sourceArchiveMs,
    ...resolve,
  });
  return { sha512: computeSha512(artifact), electron };
}

function expectationsFromFlags(options: ValidateCommandOptions): RecipeExpectations {
  const flags: RecipeExpectations = {};
  if (options.expectVersion !== undefined) flags.version = options.expectVersion;
  if (options.expectRel !== undefined) flags.rel = options.expectRel;
  if (options.expectCommit !== undefined) flags.commit = options.expectCommit;
  if (options.expectElectron !== undefined) flags.electron = options.expectElectron;
  if (options.expectSha512 !== undefined) flags.sha512 = options.expectSha512;
  return flags;
}

/** Validate the recipe, print the framed report and return the exit code. */
export async function validateCommand(
  options: ValidateCommandOptions,
  config: BotConfig,
  resolve: ResolveOptions = {},
): Promise<number> {
  let expectations: RecipeExpectations = {};

  try {
    if (options.checkOutput) {
      const { next } = await readCheckOutput(options.checkOutput);
      expectations = { version: next.version, rel: next.rel, commit: next.commit };
    }
    if (options.derive) {
      expectations = { ...expectations, ...(await deriveExpectations(options.recipe, config, resolve)) };
    }
  } catch (error) {
    log.error(`Cannot establish expected values: ${formatError(error)}`);
    return 1;
  }

  // Explicit flags win over derived values
  expectations = { ...expectations, ...expectationsFromFlags(options) };

  let report = await validateRecipeFile(options.recipe, expectations);
  if (options.probe && report.errors.length === 0) {
    report = await probeDownload(report, { timeoutMs: config.timeouts.probeMs });
  }

  process.stdout.write(`${formatReportBlock(report)}\n`);

  const summary = summarizeReport(report);
  log.info(`Validation: ${summary.passed}/${summary.total} checks passed (${summary.passRate}%)`);
  if (!report.validationSuccessful) {
    for (const check of report.checks.filter((c) => c.status === "fail" && !c.advisory)) {
      log.error(`${check.name}: ${check.message}`);
    }
  }
  return report.validationSuccessful ? 0 : 1;
}
