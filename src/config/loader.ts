import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { DashctlConfig } from "../types/config.js";
import type { Failure } from "../types/failure.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "DASHCTL_";

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply DASHCTL_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  const result: ConfigRecord = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // DASHCTL_APP_DIR → app_dir
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is not validated.
 */
export function loadRawConfig(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv } = {}): ConfigRecord {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }

  return applyEnvOverrides(merged, opts.env ?? process.env);
}

export type LoadConfigResult = { ok: true; config: DashctlConfig } | { ok: false; error: Failure };

/**
 * Load, validate and freeze the configuration. The frozen value is what every
 * component receives at construction.
 */
export function loadConfig(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv } = {}): LoadConfigResult {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;
  if (!fs.existsSync(path.join(dir, "base.yaml"))) {
    return {
      ok: false,
      error: {
        code: "CONFIG_INVALID",
        message: `Config not found: ${path.join(dir, "base.yaml")}`,
        remediation: "Pass --config <dir> pointing at a directory that contains base.yaml.",
      },
    };
  }

  let raw: ConfigRecord;
  try {
    raw = loadRawConfig({ ...opts, configDir: dir });
  } catch (e: unknown) {
    return {
      ok: false,
      error: { code: "CONFIG_INVALID", message: e instanceof Error ? e.message : String(e) },
    };
  }

  const res = validateConfig(raw);
  if (!res.valid) {
    return {
      ok: false,
      error: {
        code: "CONFIG_INVALID",
        message: `Invalid configuration: ${res.errors}`,
        remediation: `Fix the values in ${dir} or unset the ${ENV_PREFIX}* variables that override them.`,
      },
    };
  }

  return { ok: true, config: deepFreeze(res.config) };
}
