/**
 * cursor-bin-updater
 * Commands: check, update, run, validate
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { configureLogging, createLogger, type LogFormat } from "@cursor-bin/logger";
import { formatError, loadConfig, type BotConfig } from "@cursor-bin/core";
import { cleanupScratchDirs } from "@cursor-bin/artifact";
import { checkCommand, type CheckCommandOptions } from "./commands/check.js";
import { updateCommand } from "./commands/update.js";
import { runCommand, type RunCommandOptions } from "./commands/run.js";
import { validateCommand, type ValidateCommandOptions } from "./commands/validate.js";

const log = createLogger("cli");

type GlobalOptions = {
  debug?: boolean;
  logFormat?: LogFormat;
};

function parsePositiveInt(value: string): number {
  if (!/^[1-9]\d*$/.test(value)) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return Number(value);
}

function onSignal(signal: NodeJS.Signals, code: number): void {
  const removed = cleanupScratchDirs();
  log.warn(`Received ${signal}, removed ${removed.length} scratch director${removed.length === 1 ? "y" : "ies"}`);
  process.exit(code);
}

const program = new Command();

program
  .name("cursor-bin-updater")
  .description("Keep the cursor-bin PKGBUILD in step with upstream Cursor releases")
  .version("0.1.0")
  .option("--debug", "Verbose tracing (also DEBUG=true)")
  .addOption(new Option("--log-format <format>", "Log output format").choices(["pretty", "github"]));

function setup(): BotConfig {
  const globals = program.opts<GlobalOptions>();
  const config = loadConfig(process.env);
  if (globals.debug) config.debug = true;
  if (globals.logFormat) config.logFormat = globals.logFormat;
  configureLogging({ debug: config.debug, format: config.logFormat });
  return config;
}

async function execute(task: (config: BotConfig) => Promise<number>): Promise<void> {
  let code: number;
  try {
    code = await task(setup());
  } catch (error) {
    log.fatal(`Unexpected error: ${formatError(error)}`);
    code = 1;
  }
  process.exit(code);
}

program
  .command("check")
  .description("Compare the local PKGBUILD with upstream and write the decision file")
  .option("--recipe <path>", "PKGBUILD to check", "PKGBUILD")
  .option("--output <path>", "Decision file to write", "check_output.json")
  .action(async (options: CheckCommandOptions) => {
    await execute((config) => checkCommand(options, config));
  });

program
  .command("update")
  .description("Patch the PKGBUILD from a decision file")
  .argument("[checkOutput]", "Decision file written by check", "check_output.json")
  .option("--recipe <path>", "PKGBUILD to patch", "PKGBUILD")
  .action(async (checkOutput: string, options: { recipe: string }) => {
    await execute((config) => updateCommand({ recipe: options.recipe, checkOutput }, config));
  });

program
  .command("run")
  .description("Run check, then update")
  .option("--recipe <path>", "PKGBUILD to update", "PKGBUILD")
  .option("--output <path>", "Decision file to write", "check_output.json")
  .action(async (options: RunCommandOptions) => {
    await execute((config) => runCommand(options, config));
  });

program
  .command("validate")
  .description("Validate the PKGBUILD and print a framed JSON report")
  .option("--recipe <path>", "PKGBUILD to validate", "PKGBUILD")
  .option("--expect-version <version>", "Expected pkgver")
  .option("--expect-rel <rel>", "Expected pkgrel", parsePositiveInt)
  .option("--expect-commit <commit>", "Expected upstream commit")
  .option("--expect-electron <tag>", "Expected Electron tag, e.g. electron34")
  .option("--expect-sha512 <sum>", "Expected .deb checksum")
  .option("--check-output <path>", "Take expected version, pkgrel and commit from a decision file")
  .option("--derive", "Download the .deb and derive the expected checksum and Electron tag")
  .option("--probe", "Check that the download URL is reachable (advisory)")
  .action(async (options: ValidateCommandOptions) => {
    await execute((config) => validateCommand(options, config));
  });

process.once("SIGINT", () => onSignal("SIGINT", 130));
process.once("SIGTERM", () => onSignal("SIGTERM", 143));

program.parseAsync().catch((error: unknown) => {
  log.fatal(`Fatal error: ${formatError(error)}`);
  process.exit(1);
});
