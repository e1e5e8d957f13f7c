export type { ReleaseMetadata } from "./release.js";
export type { RecipeSnapshot, RecipeFields, RecipePatch } from "./recipe.js";
export type { DecisionRecord, DetectionConflict, UpdateMode } from "./decision.js";
export type { CheckStatus, ValidationCheck, ValidationReport, ValidationSummary } from "./validation.js";
export { botEnvSchema, loadConfig, DEFAULT_TIMEOUTS } from "./config.js";
export type { BotEnv, BotConfig, Timeouts } from "./config.js";
