export type { CommandRunner, CommandOptions } from "./command.js";
export { runCommand } from "./command.js";
export { withScratchDir, liveScratchDirs, cleanupScratchDirs } from "./scratch.js";
export type { IntrospectOptions } from "./introspector.js";
export { extractInnerVersion, DATA_MEMBER } from "./introspector.js";
export type { ResolveOptions } from "./electron.js";
export {
  findElectronVersion,
  electronTagFromVersion,
  resolveElectronTag,
  deriveElectronTag,
} from "./electron.js";
