/**
 * skein fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { format, formatDiagnostic, makeWarning } from "@skein/core";
import type { Span } from "@skein/core";
import { loadSource } from "./preflight.js";

export interface FmtCommandOptions {
  /** Overwrite the file in place. */
  write?: boolean;
  /** Write nothing; exit 1 when the file is not in canonical form. */
  check?: boolean;
}

const STRING_LITERAL = /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/g;

/** Where the first comment starts. Comment markers inside string literals do not count. */
export function firstComment(source: string, file: string): Span | undefined {
  const code = source.replace(STRING_LITERAL, (s) => `"${" ".repeat(s.length - 2)}"`);
  const match = /\/\/|\/\*/.exec(code);
  if (!match) return undefined;
  const lines = code.slice(0, match.index).split("\n");
  const line = lines.length;
  const col = lines[lines.length - 1].length + 1;
  return { file, startLine: line, startCol: col, endLine: line, endCol: col + 2 };
}

export async function runFmt(file: string, opts: FmtCommandOptions): Promise<number> {
  const loaded = loadSource(file, true);
  if (!loaded.ok) return loaded.exitCode;
  const formatted = format(loaded.program);

  if (opts.check) {
    if (formatted === loaded.source) return 0;
    console.error(`${file} is not formatted.`);
    return 1;
  }

  const comment = firstComment(loaded.source, file);
  if (comment) {
    console.error(formatDiagnostic(makeWarning("W_FMT_COMMENTS", "Formatting removes comments.", comment), true));
  }

  try {
    if (opts.write && file !== "-") {
      fs.writeFileSync(file, formatted, "utf-8");
    } else {
      process.stdout.write(formatted);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, true));
    return 4;
  }
  return 0;
}
