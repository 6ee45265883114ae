/**
 * @setcheck/cli — Command-line verifier.
 *
 * `run()` is the whole command as a function: arguments in, report on
 * stdout, exit status out.
 */

export { run, EXIT_CODES, PROGRESS_INTERVAL } from "./run.js";
export type { ExitCode, OutputStream, RunIo } from "./run.js";
export { parseCliArgs, CliConfigSchema, SET_TYPES, USAGE } from "./config.js";
export type { CliCommand, CliConfig, SetType } from "./config.js";
export { createLogger } from "./logger.js";
export { renderReport, renderReportJson } from "./report-renderer.js";
export type { RenderOptions } from "./report-renderer.js";
