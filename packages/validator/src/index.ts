export type { RecipeExpectations } from "./checks.js";
export { validateRecipe, validateRecipeFile } from "./checks.js";
export type { ProbeOptions } from "./probe.js";
export { probeDownload, findDownloadUrl } from "./probe.js";
export { summarizeReport, formatReportBlock, REPORT_START, REPORT_END } from "./report.js";
