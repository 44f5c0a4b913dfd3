/**
 * Skein configuration loader: host namespace policy and execution limits.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { Limits } from "./evaluator.js";

/** Host namespaces gated by configuration. Pure builtins are always available. */
export const KNOWN_HOST_NAMESPACES = ["file"] as const;

export interface SkeinConfig {
  version: number;
  allow: string[];
  deny?: string[];
  limits?: Limits;
}

export interface ResolvedConfig {
  config: SkeinConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const PROJECT_CONFIG_FILE = ".skeinrc.json";

const DEFAULT_CONFIG: SkeinConfig = {
  version: 1,
  allow: [],
};

const LIMIT_KEYS = ["maxIterations", "maxCallDepth", "timeMs"] as const;

/**
 * Load configuration from project or user config.
 * Precedence: ./.skeinrc.json > ~/.skein/config.json > default (allow nothing)
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".skein", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): SkeinConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): SkeinConfig | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return validateConfigShape(JSON.parse(raw));
  } catch {
    // Malformed files are skipped so the next source in line applies.
    return null;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, key: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new Error(`Config '${key}' must be an array when present.`);
  }
  return value.filter((x): x is string => typeof x === "string");
}

export function validateConfigShape(data: unknown): SkeinConfig {
  if (!isObject(data)) {
    throw new Error("Config must be a JSON object.");
  }

  const version = typeof data["version"] === "number" ? data["version"] : 1;
  const allow = stringList(data["allow"], "allow") ?? [];
  const deny = stringList(data["deny"], "deny");

  const rawLimits = data["limits"];
  let limits: Limits | undefined;
  if (rawLimits !== undefined) {
    if (!isObject(rawLimits)) {
      throw new Error("Config 'limits' must be an object when present.");
    }
    limits = {};
    for (const key of LIMIT_KEYS) {
      const value = rawLimits[key];
      if (value === undefined) continue;
      if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
        throw new Error(`Config 'limits.${key}' must be a positive integer.`);
      }
      limits[key] = value;
    }
  }

  return { version, allow, deny, limits };
}

/**
 * Build the set of allowed host namespaces from config + CLI overrides.
 */
export function buildAllowedNamespaces(config: SkeinConfig, unsafeAllowAll: boolean): Set<string> {
  if (unsafeAllowAll) {
    return new Set(KNOWN_HOST_NAMESPACES);
  }
  const denySet = new Set(config.deny ?? []);
  return new Set(config.allow.filter((ns) => !denySet.has(ns)));
}
