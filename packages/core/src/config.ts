/**
 * uiscript runtime configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { DEFAULT_SENTINEL } from "./lexer.js";
import { DEFAULT_LIMITS, LIMIT_KEYS, type ResourceLimits } from "./limits.js";

export interface RuntimeConfig {
  version: number;
  /** When false, blocks are stripped from output but never run. */
  enabled: boolean;
  sentinel: string;
  limits: ResourceLimits;
}

export interface ResolvedConfig {
  config: RuntimeConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: RuntimeConfig = {
  version: 1,
  enabled: true,
  sentinel: DEFAULT_SENTINEL,
  limits: { ...DEFAULT_LIMITS },
};

export const PROJECT_CONFIG_FILE = ".uiscript.json";

/**
 * Load configuration from project or user config.
 * Precedence: ./.uiscript.json > ~/.uiscript/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".uiscript", "config.json");

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

export function loadConfig(cwd?: string, homeDir?: string): RuntimeConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): RuntimeConfig | null {
  try {
    if (!fs.existsSync(filePath)) return null;
    const raw = fs.readFileSync(filePath, "utf-8");
    return validateConfigShape(JSON.parse(raw));
  } catch {
    return null;
  }
}

function isRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

export function validateConfigShape(data: unknown): RuntimeConfig {
  if (!isRecord(data)) {
    throw new Error("Config must be a JSON object.");
  }

  const versionRaw = data["version"];
  const version = typeof versionRaw === "number" ? versionRaw : 1;

  const enabledRaw = data["enabled"];
  if (enabledRaw !== undefined && typeof enabledRaw !== "boolean") {
    throw new Error("Config 'enabled' must be a boolean when present.");
  }
  const enabled = typeof enabledRaw === "boolean" ? enabledRaw : true;

  const sentinel = data["sentinel"] ?? DEFAULT_SENTINEL;
  if (typeof sentinel !== "string" || sentinel.length < 2 || !sentinel.endsWith("{")) {
    throw new Error("Config 'sentinel' must be a string ending with '{'.");
  }

  const limitsRaw = data["limits"] ?? {};
  if (!isRecord(limitsRaw)) {
    throw new Error("Config 'limits' must be an object when present.");
  }
  const limits: ResourceLimits = { ...DEFAULT_LIMITS };
  for (const key of LIMIT_KEYS) {
    const value = limitsRaw[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
      throw new Error(`Config limit '${key}' must be a positive integer.`);
    }
    limits[key] = value;
  }

  return { version, enabled, sentinel, limits };
}
