/**
 * Tests for configuration loading and namespace policy.
 */
import { describe, it, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { buildAllowedNamespaces, resolveConfig, validateConfigShape } from "./config.js";

const dirs: string[] = [];

function tempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  dirs.push(dir);
  return dir;
}

function writeUserConfig(home: string, data: unknown): string {
  const dir = path.join(home, ".skein");
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, JSON.stringify(data));
  return file;
}

describe("Skein config", () => {
  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("prefers the project file", () => {
    const project = tempDir("skein-config-project-");
    const home = tempDir("skein-config-home-");
    fs.writeFileSync(path.join(project, ".skeinrc.json"), JSON.stringify({ allow: ["file"] }));
    writeUserConfig(home, { allow: [] });

    const resolved = resolveConfig(project, home);
    assert.equal(resolved.source, "project");
    assert.equal(resolved.path, path.join(project, ".skeinrc.json"));
    assert.deepEqual(resolved.config.allow, ["file"]);
  });

  it("falls back to the user file when the project file is malformed", () => {
    const project = tempDir("skein-config-project-");
    const home = tempDir("skein-config-home-");
    fs.writeFileSync(path.join(project, ".skeinrc.json"), "{ not json");
    const userPath = writeUserConfig(home, { version: 2, allow: ["file"], limits: { maxIterations: 100 } });

    const resolved = resolveConfig(project, home);
    assert.equal(resolved.source, "user");
    assert.equal(resolved.path, userPath);
    assert.deepEqual(resolved.config, { version: 2, allow: ["file"], deny: undefined, limits: { maxIterations: 100 } });
  });

  it("defaults to allowing nothing", () => {
    const empty = tempDir("skein-config-empty-");
    const resolved = resolveConfig(empty, empty);
    assert.equal(resolved.source, "default");
    assert.equal(resolved.path, null);
    assert.deepEqual(resolved.config.allow, []);
  });

  it("validates limits", () => {
    assert.throws(() => validateConfigShape({ limits: { timeMs: 0 } }), {
      message: "Config 'limits.timeMs' must be a positive integer.",
    });
    assert.throws(() => validateConfigShape({ limits: [] }), {
      message: "Config 'limits' must be an object when present.",
    });
    assert.throws(() => validateConfigShape({ allow: "file" }), { message: "Config 'allow' must be an array when present." });
    assert.throws(() => validateConfigShape(null), { message: "Config must be a JSON object." });
    assert.deepEqual(validateConfigShape({ limits: { maxCallDepth: 10, other: 1 } }).limits, { maxCallDepth: 10 });
  });

  it("drops denied namespaces", () => {
    assert.deepEqual([...buildAllowedNamespaces({ version: 1, allow: ["file", "net"], deny: ["net"] }, false)], ["file"]);
    assert.deepEqual([...buildAllowedNamespaces({ version: 1, allow: [] }, true)], ["file"]);
  });
});
