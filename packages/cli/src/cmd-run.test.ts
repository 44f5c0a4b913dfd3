/**
 * Tests for skein run command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createRequire, syncBuiltinESMExports } from "node:module";
import { parseAssignments, runRun } from "./cmd-run.js";
import type { RunCommandOptions } from "./cmd-run.js";

const require = createRequire(import.meta.url);

async function captureCmd(fn: () => Promise<number>): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("skein run", () => {
  let tmpDir = "";

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "skein-cli-run-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeProgram(source: string, name = "main.skn"): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, source, "utf-8");
    return file;
  }

  function runIn(file: string, opts: RunCommandOptions = {}) {
    return captureCmd(() => runRun(file, { cwd: tmpDir, homeDir: tmpDir, ...opts }));
  }

  it("prints script output followed by the result as JSON", async () => {
    const file = writeProgram(`print "hi";\nreturn {ok: true, n: 2};\n`);
    const result = await runIn(file);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, 'hi\n{\n  "ok": true,\n  "n": 2\n}');
    assert.equal(result.stderr, "");
  });

  it("binds input variables from --set", async () => {
    const file = writeProgram(`varset in Inputs { var name: string; var count: int = 1; }\nreturn {name: name, count: count};\n`);
    const result = await runIn(file, { set: ['main.Inputs.name="Ann"', "main.Inputs.count=3"] });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, '{\n  "name": "Ann",\n  "count": 3\n}');
  });

  it("rejects a malformed --set with exit code 2", async () => {
    const file = writeProgram("return null;\n");
    const result = await runIn(file, { set: ["=3"] });
    assert.equal(result.code, 2);
    const diag = JSON.parse(result.stderr) as { code: string };
    assert.equal(diag.code, "E_USAGE");
  });

  it("runs imported files resolved beside the program", async () => {
    fs.mkdirSync(path.join(tmpDir, "lib"));
    writeProgram('function greet(who: string): string { return "hi " + who; }\n', "lib/greet.skn");
    const file = writeProgram('import "lib/greet.skn";\nprint greet("Ann");\nreturn null;\n');
    const result = await runIn(file);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "hi Ann\nnull");
  });

  it("exits with 4 and a pretty E_IO when the file cannot be read", async () => {
    const result = await runIn(path.join(tmpDir, "missing.skn"), { pretty: true });
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("error[E_IO]: Error reading file: ENOENT"), result.stderr);
  });

  it("exits with 2 on parse errors", async () => {
    const file = writeProgram("break;\n");
    const result = await runIn(file);
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr) as Array<{ code: string; message: string }>;
    assert.equal(diags[0].code, "E_PARSE");
    assert.equal(diags[0].message, "'break' used outside of a loop.");
  });

  it("denies host namespaces the configuration does not allow", async () => {
    const file = writeProgram(`print file.exists("nope.txt");\n`);
    const result = await runIn(file);
    assert.equal(result.code, 3);
    const diags = JSON.parse(result.stderr) as Array<{ code: string; message: string; span: { startLine: number } }>;
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_NS_DENIED");
    assert.equal(diags[0].message, "Host namespace 'file' is not allowed by configuration.");
    assert.equal(diags[0].span.startLine, 1);
  });

  it("allows host namespaces from the project config", async () => {
    fs.writeFileSync(path.join(tmpDir, ".skeinrc.json"), JSON.stringify({ allow: ["file"] }), "utf-8");
    const file = writeProgram(`print file.exists("${path.join(tmpDir, "nope.txt")}");\n`);
    const result = await runIn(file);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "false\nnull");
  });

  it("allows every host namespace with --unsafe-allow-all", async () => {
    const file = writeProgram(`return file.exists("${path.join(tmpDir, "main.skn")}");\n`);
    const result = await runIn(file, { unsafeAllowAll: true });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "true");
  });

  it("reports runtime errors as JSON with exit code 4", async () => {
    const file = writeProgram("var a = 1;\nprint a / 0;\n");
    const result = await runIn(file);
    assert.equal(result.code, 4);
    const err = JSON.parse(result.stderr) as { code: string; message: string; span: { startLine: number } };
    assert.equal(err.code, "E_DIV_ZERO");
    assert.equal(err.message, "Division by zero.");
    assert.equal(err.span.startLine, 2);
  });

  it("reports runtime errors in pretty form", async () => {
    const file = writeProgram("var a = 1;\nprint a / 0;\n");
    const result = await runIn(file, { pretty: true });
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith(`error[E_DIV_ZERO]: Division by zero.\n  --> ${file}:2:`));
  });

  it("applies limits from the config", async () => {
    fs.writeFileSync(path.join(tmpDir, ".skeinrc.json"), JSON.stringify({ limits: { maxIterations: 3 } }), "utf-8");
    const file = writeProgram("var i = 0;\nwhile (true) { i++; }\n");
    const result = await runIn(file);
    assert.equal(result.code, 4);
    const err = JSON.parse(result.stderr) as { code: string; details: Record<string, unknown> };
    assert.equal(err.code, "E_BUDGET");
    assert.deepEqual(err.details, { budget: "maxIterations", limit: 3, actual: 4 });
  });

  it("writes a JSONL trace", async () => {
    const file = writeProgram(`print string.upper("a");\n`);
    const tracePath = path.join(tmpDir, "trace.jsonl");
    const result = await runIn(file, { trace: tracePath });
    assert.equal(result.code, 0);
    const events = fs
      .readFileSync(tracePath, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as { event: string; runId: string; data?: Record<string, unknown> });
    assert.equal(events[0].event, "run_start");
    assert.equal(events[events.length - 1].event, "run_end");
    assert.ok(events.every((e) => e.runId === events[0].runId));
    const builtin = events.find((e) => e.event === "builtin_start");
    assert.equal(builtin?.data?.["builtin"], "string.upper");
  });

  it("returns E_IO when trace write fails after trace file is opened", async () => {
    const file = writeProgram("return {ok: true};\n");
    const tracePath = path.join(tmpDir, "trace.jsonl");

    const fsCjs = require("fs") as typeof import("node:fs");
    const originalWriteSync = fsCjs.writeSync;

    fsCjs.writeSync = (() => {
      throw new Error("simulated trace write failure");
    }) as typeof fsCjs.writeSync;
    syncBuiltinESMExports();

    try {
      const result = await runIn(file, { trace: tracePath });
      assert.equal(result.code, 4);
      assert.ok(result.stderr.includes("simulated trace write failure"));
    } finally {
      fsCjs.writeSync = originalWriteSync;
      syncBuiltinESMExports();
    }
  });

  it("returns E_IO when trace close fails in finalization", async () => {
    const file = writeProgram("return {ok: true};\n");
    const tracePath = path.join(tmpDir, "trace.jsonl");

    const fsCjs = require("fs") as typeof import("node:fs");
    const originalCloseSync = fsCjs.closeSync;

    fsCjs.closeSync = (() => {
      throw new Error("simulated trace close failure");
    }) as typeof fsCjs.closeSync;
    syncBuiltinESMExports();

    try {
      const result = await runIn(file, { trace: tracePath });
      assert.equal(result.code, 4);
      assert.ok(result.stderr.includes("simulated trace close failure"));
    } finally {
      fsCjs.closeSync = originalCloseSync;
      syncBuiltinESMExports();
    }
  });
});

describe("parseAssignments", () => {
  it("parses JSON values and keeps other text as strings", () => {
    assert.deepEqual(parseAssignments(["main.In.a=3", "main.In.b=Bob", "main.In.c=true"]), {
      "main.In.a": 3n,
      "main.In.b": "Bob",
      "main.In.c": true,
    });
  });

  it("splits at the first equals sign", () => {
    assert.deepEqual(parseAssignments(["main.In.eq=a=b"]), { "main.In.eq": "a=b" });
  });

  it("rejects assignments without a path", () => {
    assert.throws(() => parseAssignments(["novalue"]), {
      message: "Invalid --set 'novalue': expected 'container.varSet.var=value'.",
    });
  });
});
