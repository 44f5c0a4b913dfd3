/**
 * skein trace - trace summary command
 */
import * as fs from "node:fs";

interface TraceRecord {
  ts: string;
  runId: string;
  event: string;
  data?: Record<string, unknown>;
}

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  builtinCalls: number;
  builtinsByName: Record<string, number>;
  callbacks: number;
  failures: number;
  budgetExceeded: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): TraceRecord | null {
  if (!isObject(value)) return null;
  const { ts, runId, event, data } = value;
  if (typeof ts !== "string" || typeof runId !== "string" || typeof event !== "string") return null;
  return { ts, runId, event, data: isObject(data) ? data : undefined };
}

export function summarizeTrace(content: string): TraceSummary | null {
  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceRecord[] = [];
  let skipped = 0;

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }
    const record = toRecord(parsed);
    if (record) events.push(record);
    else skipped++;
  }

  if (events.length === 0) return null;

  const summary: TraceSummary = {
    runId: events[0].runId,
    totalEvents: events.length,
    skippedLines: skipped,
    builtinCalls: 0,
    builtinsByName: {},
    callbacks: 0,
    failures: 0,
    budgetExceeded: 0,
  };
  let hasBuiltinError = false;
  let hasRunError = false;

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end":
        summary.endTime = ev.ts;
        if (ev.data?.["error"]) hasRunError = true;
        break;
      case "builtin_start": {
        summary.builtinCalls++;
        const name = ev.data?.["builtin"];
        const key = typeof name === "string" ? name : "unknown";
        summary.builtinsByName[key] = (summary.builtinsByName[key] ?? 0) + 1;
        break;
      }
      case "builtin_end":
        if (ev.data?.["outcome"] === "err") {
          summary.failures++;
          hasBuiltinError = true;
        }
        break;
      case "callback_start":
        summary.callbacks++;
        break;
      case "callback_end":
        if (ev.data?.["outcome"] === "err") summary.failures++;
        break;
      case "budget_exceeded":
        summary.budgetExceeded++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  // A failed builtin already accounts for the run_end error it caused.
  if (hasRunError && !hasBuiltinError) {
    summary.failures++;
  }

  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content);
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:          ${summary.runId}`);
  console.log(`  Total events:    ${summary.totalEvents}`);
  console.log(`  Builtin calls:   ${summary.builtinCalls}`);
  if (Object.keys(summary.builtinsByName).length > 0) {
    console.log(`  Builtins used:`);
    for (const [name, count] of Object.entries(summary.builtinsByName)) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Callbacks:       ${summary.callbacks}`);
  console.log(`  Failures:        ${summary.failures}`);
  console.log(`  Budget exceeded: ${summary.budgetExceeded}`);
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:        ${summary.durationMs}ms`);
  }
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:   ${summary.skippedLines}`);
  }
  return 0;
}
