#!/usr/bin/env tsx
/**
 * skein - Skein Language CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCheck } from "./cmd-check.js";
import type { CheckCommandOptions } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import type { RunCommandOptions } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import type { FmtCommandOptions } from "./cmd-fmt.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program.name("skein").description("Skein: a declaratively typed scripting language").version(pkg.version);

program
  .command("check")
  .description("Static validation without execution")
  .argument("<file>", "Skein source file to check")
  .option("--pretty", "Human-readable output", false)
  .option("--unsafe-allow-all", "[DEV ONLY] Allow every host namespace", false)
  .action(async (file: string, opts: CheckCommandOptions) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("run")
  .description("Run a Skein program")
  .argument("<file>", "Skein source file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("--set <path=json>", "Bind a host-visible variable before the run (repeatable)", collect, [])
  .option("--unsafe-allow-all", "[DEV ONLY] Allow every host namespace", false)
  .action(async (file: string, opts: RunCommandOptions) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Skein source file to format (or - for stdin)")
  .option("--write", "Overwrite file in place", false)
  .option("--check", "Exit 1 when the file is not formatted; write nothing", false)
  .action(async (file: string, opts: FmtCommandOptions) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and where it was loaded from")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["check", "run", "fmt", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
