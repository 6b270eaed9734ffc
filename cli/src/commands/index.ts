export { createAsciiArtProgram, readStdin } from "./ascii-art.js";
export type { AsciiArtProgramOptions } from "./ascii-art.js";
export { createDevHooksProgram } from "./dev-hooks.js";
export type { DevHooksProgramOptions } from "./dev-hooks.js";
export { createGitScanProgram } from "./git-scan.js";
export type { GitScanProgramOptions } from "./git-scan.js";
export type { CliIO, ProgramOptions } from "./io.js";
export { VERSION } from "./io.js";
