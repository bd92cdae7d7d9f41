export { runCli, defaultDeps } from './run.js';
export { createProgram, CLI_NAME, VERSION } from './program.js';
export type { ProgramDeps, OutputSink } from './program.js';
export { loadConfig, requireApiKey, envSchema } from './config.js';
export type { CliConfig } from './config.js';
export { parseFragmentLines } from './fragments.js';
export type { FragmentLineError, ParsedFragments } from './fragments.js';
export { defaultServices } from './services.js';
export type { CliServices, Storage } from './services.js';
export { CliError, exitCodeFor } from './errors.js';
export type { CliErrorCode } from './errors.js';
