export type {
  ReleaseFetchOptions,
  ReferenceFetchOptions,
  DetectionInput,
  DetectionSettings,
  UpdateRecipeOptions,
} from "./types.js";
export { parseVersion, compareVersions, isNewerVersion } from "./version.js";
export { fetchReleaseMetadata, fetchReferenceSnapshot, readLocalSnapshot } from "./checker.js";
export { detectUpdate, isManualRelUpdate } from "./detector.js";
export { downloadArtifact, computeSha512 } from "./downloader.js";
export { updateRecipe } from "./recipe-updater.js";
