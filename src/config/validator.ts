import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { DashctlConfig } from "../types/config.js";

const stringList = { type: "array", items: { type: "string", minLength: 1 } };

/** Config schema. Every section is required; there are no built-in defaults. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "app_dir", "runtime", "dependencies", "launch", "packaging"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    app_dir: { type: "string", minLength: 1 },
    runtime: {
      type: "object",
      required: ["name", "commands", "version_args", "min_version", "install_hints"],
      properties: {
        name: { type: "string", minLength: 1 },
        commands: { ...stringList, minItems: 1 },
        version_args: stringList,
        min_version: { type: "string", pattern: "^\\d+(\\.\\d+){0,2}$" },
        install_hints: {
          type: "object",
          required: ["default"],
          properties: { default: { type: "string" } },
          additionalProperties: { type: "string" },
        },
      },
    },
    dependencies: {
      type: "object",
      required: ["manifest", "sentinel", "install_args"],
      properties: {
        manifest: { type: "string", minLength: 1 },
        // Interpolated into `-c "import <sentinel>"`, so only dotted identifiers.
        sentinel: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*(\\.[A-Za-z_][A-Za-z0-9_]*)*$" },
        install_args: { ...stringList, minItems: 1 },
      },
    },
    launch: {
      type: "object",
      required: ["entrypoint", "port", "headless", "open_browser", "browser_delay_ms"],
      properties: {
        entrypoint: { type: "string", minLength: 1 },
        port: { type: "integer", minimum: 1, maximum: 65535 },
        headless: { type: "boolean" },
        open_browser: { type: "boolean" },
        browser_delay_ms: { type: "integer", minimum: 0 },
      },
    },
    packaging: {
      type: "object",
      required: ["output_dir", "staging_root", "format", "exclude", "credential"],
      properties: {
        output_dir: { type: "string", minLength: 1 },
        staging_root: { type: "string", minLength: 1 },
        format: { type: "string", enum: ["zip", "tar.gz"] },
        exclude: stringList,
        credential: {
          type: "object",
          required: ["file", "variable", "env_var"],
          properties: {
            file: { type: "string", minLength: 1 },
            variable: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
            env_var: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" },
          },
        },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: DashctlConfig; errors: null }
  | { valid: false; errors: string };

let compiled: AjvValidateFn<DashctlConfig> | null = null;

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  compiled ??= ajv.compile<DashctlConfig>(CONFIG_SCHEMA);
  if (compiled(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(compiled.errors) };
}
