import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { isBuiltInTemplate } from "./render/templates";

export const CONFIG_FILENAME = ".jotsite.json";

export interface FileConfig {
  source?: string;
  output?: string;
  clean?: boolean;
  webPrefix?: string;
  template?: string;
  strict?: boolean;
  highlight?: boolean;
}

const STRING_KEYS = ["source", "output", "webPrefix", "template"] as const;
const BOOLEAN_KEYS = ["clean", "strict", "highlight"] as const;

type StringKey = (typeof STRING_KEYS)[number];
type BooleanKey = (typeof BOOLEAN_KEYS)[number];

const stringKeys: ReadonlySet<string> = new Set<string>(STRING_KEYS);
const booleanKeys: ReadonlySet<string> = new Set<string>(BOOLEAN_KEYS);

function isStringKey(key: string): key is StringKey {
  return stringKeys.has(key);
}

function isBooleanKey(key: string): key is BooleanKey {
  return booleanKeys.has(key);
}

/**
 * Find config file by walking up from a directory
 */
export function findConfig(startDir: string): string | null {
  let current = resolve(startDir);

  while (true) {
    const configPath = join(current, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return null;
}

/**
 * Validate parsed JSON as a config object
 */
export function parseConfig(value: unknown, configPath: string): FileConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error(`Config in ${configPath} must be a JSON object`);
  }

  const config: FileConfig = {};
  for (const [key, field] of Object.entries(value)) {
    if (isStringKey(key)) {
      if (typeof field !== "string") {
        throw new Error(`Config key "${key}" in ${configPath} must be a string`);
      }
      config[key] = field;
    } else if (isBooleanKey(key)) {
      if (typeof field !== "boolean") {
        throw new Error(`Config key "${key}" in ${configPath} must be a boolean`);
      }
      config[key] = field;
    } else {
      throw new Error(`Unknown config key "${key}" in ${configPath}`);
    }
  }

  return config;
}

/**
 * Load and parse config file, resolving relative paths
 */
export function loadConfig(configPath: string): FileConfig {
  const configDir = dirname(configPath);
  const raw = readFileSync(configPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in ${configPath}: ${e}`);
  }

  const config = parseConfig(parsed, configPath);

  // Resolve relative paths from config file location
  if (config.source) config.source = resolve(configDir, config.source);
  if (config.output) config.output = resolve(configDir, config.output);
  if (config.template && !isBuiltInTemplate(config.template)) {
    config.template = resolve(configDir, config.template);
  }

  return config;
}
