/**
 * Tests for skein config command behavior.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";

async function captureConfig(opts: {
  json?: boolean;
  cwd?: string;
  homeDir?: string;
}): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runConfig(opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("skein config", () => {
  let cwd = "";
  let homeDir = "";

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "skein-cli-config-cwd-"));
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), "skein-cli-config-home-"));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it("prints project configuration as JSON", async () => {
    const configPath = path.join(cwd, ".skeinrc.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({ version: 1, allow: ["file", "net"], deny: ["net"], limits: { maxIterations: 100 } }),
      "utf-8"
    );

    const result = await captureConfig({ json: true, cwd, homeDir });
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), {
      source: "project",
      path: configPath,
      config: { version: 1, allow: ["file", "net"], deny: ["net"], limits: { maxIterations: 100 } },
      effectiveAllow: ["file"],
    });
  });

  it("falls back to the user configuration", async () => {
    fs.mkdirSync(path.join(homeDir, ".skein"));
    fs.writeFileSync(path.join(homeDir, ".skein", "config.json"), JSON.stringify({ allow: ["file"] }), "utf-8");

    const result = await captureConfig({ json: true, cwd, homeDir });
    const parsed = JSON.parse(result.stdout) as { source: string; effectiveAllow: string[] };
    assert.equal(parsed.source, "user");
    assert.deepEqual(parsed.effectiveAllow, ["file"]);
  });

  it("prints the default configuration as text", async () => {
    const result = await captureConfig({ cwd, homeDir });
    assert.equal(result.code, 0);
    assert.deepEqual(result.stdout.split("\n"), [
      "Effective Skein configuration",
      "  Source:          default",
      "  Path:            (none)",
      "  Allow:           (none)",
      "  Deny:            (none)",
      "  Effective allow: (none)",
      "  Limits:          (none)",
    ]);
  });
});
