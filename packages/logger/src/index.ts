import { Logger } from "tslog";

export type LogFormat = "pretty" | "github";

export interface LoggingOptions {
  /** Emit debug-level traces. */
  debug: boolean;
  /** `github` prints GitHub Actions workflow commands instead of pretty lines. */
  format: LogFormat;
}

// tslog numeric levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
const DEBUG_LEVEL = 2;
const INFO_LEVEL = 3;
const ARGS_KEY = "args";

let options: LoggingOptions = { debug: false, format: "pretty" };
const loggers = new Set<Logger<unknown>>();

function minLevelFor(opts: LoggingOptions): number {
  return opts.debug ? DEBUG_LEVEL : INFO_LEVEL;
}

function stringifyArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (typeof arg === "object" && arg !== null && "message" in arg && typeof arg.message === "string") {
    return arg.message;
  }
  if (typeof arg === "object" && arg !== null) return JSON.stringify(arg);
  return String(arg);
}

function escapeCommandData(value: string): string {
  return value.replace(/%/g, "%25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

/**
 * Render one log call as a GitHub Actions workflow command.
 * Info lines are printed as-is so they show up in the job log unprefixed.
 */
export function formatAnnotation(levelName: string, args: unknown[]): string {
  const message = args.map(stringifyArg).join(" ");
  switch (levelName.toUpperCase()) {
    case "SILLY":
    case "TRACE":
    case "DEBUG":
      return `::debug::${escapeCommandData(message)}`;
    case "WARN":
      return `::warning::${escapeCommandData(message)}`;
    case "ERROR":
    case "FATAL":
      return `::error::${escapeCommandData(message)}`;
    default:
      return message;
  }
}

function levelNameOf(logObj: Record<string, unknown>): string {
  const meta = logObj._meta;
  if (typeof meta === "object" && meta !== null && "logLevelName" in meta && typeof meta.logLevelName === "string") {
    return meta.logLevelName;
  }
  return "INFO";
}

function githubTransport(logObj: Record<string, unknown>): void {
  if (options.format !== "github") return;
  const args = logObj[ARGS_KEY];
  process.stdout.write(`${formatAnnotation(levelNameOf(logObj), Array.isArray(args) ? args : [])}\n`);
}

export function createLogger(name: string): Logger<unknown> {
  const logger = new Logger<unknown>({
    name,
    type: options.format === "github" ? "hidden" : "pretty",
    minLevel: minLevelFor(options),
    argumentsArrayName: ARGS_KEY,
  });
  logger.attachTransport(githubTransport);
  loggers.add(logger);
  return logger;
}

/**
 * Apply process-wide logging options. Loggers are created at module load,
 * so this also updates every logger that already exists.
 */
export function configureLogging(next: LoggingOptions): void {
  options = { ...next };
  for (const logger of loggers) {
    logger.settings.minLevel = minLevelFor(options);
    logger.settings.type = options.format === "github" ? "hidden" : "pretty";
  }
}

export function getLoggingOptions(): LoggingOptions {
  return { ...options };
}
