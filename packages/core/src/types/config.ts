import { z } from "zod/v4";

/** The value is on when it reads "true", in any case. */
const envFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value ?? String(defaultValue)).trim().toLowerCase() === "true");

export const botEnvSchema = z.object({
  DEBUG: envFlag(false),
  VERSION_PROTECTION: envFlag(false),
  COMMIT_BASED_UPDATES: envFlag(true),
  GITHUB_ACTIONS: envFlag(false),
  GITHUB_OUTPUT: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== "" ? value : undefined)),
});

export type BotEnv = z.infer<typeof botEnvSchema>;

export interface Timeouts {
  metadataMs: number;
  referenceRecipeMs: number;
  artifactMs: number;
  sourceArchiveMs: number;
  commandMs: number;
  probeMs: number;
}

export const DEFAULT_TIMEOUTS: Timeouts = {
  metadataMs: 15_000,
  referenceRecipeMs: 15_000,
  artifactMs: 60_000,
  sourceArchiveMs: 60_000,
  commandMs: 60_000,
  probeMs: 15_000,
};

/** Built once at start-up and handed to every component. */
export interface BotConfig {
  debug: boolean;
  versionProtection: boolean;
  commitBasedUpdates: boolean;
  logFormat: "pretty" | "github";
  githubOutput?: string;
  timeouts: Timeouts;
}

export function loadConfig(env: Record<string, string | undefined>): BotConfig {
  const parsed = botEnvSchema.parse(env);
  return {
    debug: parsed.DEBUG,
    versionProtection: parsed.VERSION_PROTECTION,
    commitBasedUpdates: parsed.COMMIT_BASED_UPDATES,
    logFormat: parsed.GITHUB_ACTIONS ? "github" : "pretty",
    githubOutput: parsed.GITHUB_OUTPUT,
    timeouts: { ...DEFAULT_TIMEOUTS },
  };
}
