export { readRecipeSnapshot, readRecipeFields, readArray } from "./reader.js";
export { patchRecipe, patchRecipeLines, COMMIT_PROVENANCE } from "./patcher.js";
