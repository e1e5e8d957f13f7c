export type {
  ReleaseMetadata,
  RecipeSnapshot,
  RecipeFields,
  RecipePatch,
  DecisionRecord,
  DetectionConflict,
  UpdateMode,
  CheckStatus,
  ValidationCheck,
  ValidationReport,
  ValidationSummary,
  BotEnv,
  BotConfig,
  Timeouts,
} from "./types/index.js";
export { botEnvSchema, loadConfig, DEFAULT_TIMEOUTS } from "./types/index.js";

export {
  UPDATE_API_URL,
  AUR_RECIPE_URL,
  DOWNLOAD_BASE_URL,
  COMPANION_SOURCE_PREFIX,
  COMPANION_SHA512,
  FALLBACK_ELECTRON,
  BROWSER_USER_AGENT,
  REQUIRED_PACKAGE_FILES,
  PRODUCT_JSON_PATH,
  getDebUrl,
  getVscodeTarballUrl,
  extractCommitFromUrl,
} from "./endpoints.js";

export type { Result } from "./result.js";
export { ok, err, formatError, sleep } from "./result.js";

export type { CheckOutput } from "./check-output.js";
export {
  checkOutputSchema,
  toCheckOutput,
  fromCheckOutput,
  writeCheckOutput,
  readCheckOutput,
} from "./check-output.js";
