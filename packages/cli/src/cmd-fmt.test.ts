/**
 * Tests for skein fmt command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { firstComment, runFmt } from "./cmd-fmt.js";
import type { FmtCommandOptions } from "./cmd-fmt.js";

async function captureFmt(file: string, opts: FmtCommandOptions): Promise<{ code: number; stderr: string }> {
  const err: string[] = [];
  const origError = console.error;
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runFmt(file, opts);
    return { code, stderr: err.join("\n") };
  } finally {
    console.error = origError;
  }
}

describe("firstComment", () => {
  it("finds line and block comments", () => {
    assert.deepEqual(firstComment("var a = 1;\n  /* note */", "f.skn"), {
      file: "f.skn",
      startLine: 2,
      startCol: 3,
      endLine: 2,
      endCol: 5,
    });
    assert.equal(firstComment("var a = 1;", "f.skn"), undefined);
  });

  it("ignores comment markers inside either kind of string", () => {
    assert.equal(firstComment(`var u = "http://x";\nvar v = 'a//b /* c';`, "f.skn"), undefined);
    const after = firstComment(`var v = 'it\\'s // not'; // yes`, "f.skn");
    assert.equal(after?.startCol, 25);
  });
});

describe("skein fmt", () => {
  let tmpDir = "";

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "skein-cli-fmt-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeProgram(name: string, source: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, source, "utf-8");
    return filePath;
  }

  it("rewrites the file and warns where the first comment was", async () => {
    const filePath = writeProgram("main.skn", "var d=1; // note\nvar e=2;");
    const result = await captureFmt(filePath, { write: true });
    assert.equal(result.code, 0);
    assert.equal(result.stderr, `warning[W_FMT_COMMENTS]: Formatting removes comments.\n  --> ${filePath}:1:10`);
    assert.equal(fs.readFileSync(filePath, "utf-8"), "var d = 1;\nvar e = 2;\n");
  });

  it("does not warn about comment markers in single-quoted strings", async () => {
    const filePath = writeProgram("url.skn", "var u = 'http://example.test';");
    const result = await captureFmt(filePath, { write: true });
    assert.equal(result.code, 0);
    assert.equal(result.stderr, "");
    assert.equal(fs.readFileSync(filePath, "utf-8"), 'var u = "http://example.test";\n');
  });

  it("exits with 1 under --check when the file would change", async () => {
    const messy = writeProgram("messy.skn", "var a=[1,2];");
    const result = await captureFmt(messy, { check: true });
    assert.equal(result.code, 1);
    assert.equal(result.stderr, `${messy} is not formatted.`);
    assert.equal(fs.readFileSync(messy, "utf-8"), "var a=[1,2];");

    const clean = writeProgram("clean.skn", "var a = [1, 2];\n");
    assert.equal((await captureFmt(clean, { check: true })).code, 0);
  });

  it("keeps import statements and leaves imported files alone", async () => {
    const lib = writeProgram("lib.skn", "function twice(n:int):int{return n*2;}");
    const main = writeProgram("main.skn", 'import "lib.skn";\nprint twice(2);');
    const result = await captureFmt(main, { write: true });
    assert.equal(result.code, 0);
    assert.equal(fs.readFileSync(main, "utf-8"), 'import "lib.skn";\nprint twice(2);\n');
    assert.equal(fs.readFileSync(lib, "utf-8"), "function twice(n:int):int{return n*2;}");
  });

  it("refuses to format a program whose imports fail", async () => {
    const main = writeProgram("main.skn", 'import "missing.skn";\n');
    const result = await captureFmt(main, { write: true });
    assert.equal(result.code, 2);
    assert.ok(
      result.stderr.startsWith("error[E_IMPORT]: Cannot read imported file 'missing.skn': ENOENT"),
      result.stderr
    );
  });
});
