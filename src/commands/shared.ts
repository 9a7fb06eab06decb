import { InvalidArgumentError } from "commander";
import { loadConfig } from "../config/loader.js";
import { failureDiagnostic, type OutputFormat, type Reporter } from "../output/reporter.js";
import type { ArchiveFormat, DashctlConfig } from "../types/config.js";

export type ConfigOpts = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
};

/** Load config, reporting the failure itself; `null` means exit 1. */
export function resolveConfig(opts: ConfigOpts, reporter: Reporter): DashctlConfig | null {
  const loaded = loadConfig(opts);
  if (!loaded.ok) {
    reporter.emit(failureDiagnostic(loaded.error));
    return null;
  }
  return loaded.config;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  throw new InvalidArgumentError("Expected human or jsonl.");
}

export function parseArchiveFormat(value: string): ArchiveFormat {
  if (value === "zip" || value === "tar.gz") return value;
  throw new InvalidArgumentError("Expected zip or tar.gz.");
}
