/**
 * @skein/cli - CLI entry point re-exports
 */
export { runCheck, describeProgram } from "./cmd-check.js";
export type { CheckCommandOptions } from "./cmd-check.js";
export { runRun, parseAssignments } from "./cmd-run.js";
export type { RunCommandOptions } from "./cmd-run.js";
export { runFmt, firstComment } from "./cmd-fmt.js";
export type { FmtCommandOptions } from "./cmd-fmt.js";
export { loadSource, deniedNamespaces } from "./preflight.js";
export type { LoadedSource } from "./preflight.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
