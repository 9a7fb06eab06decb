import fs from "node:fs";
import path from "node:path";
import { formatCommand, type ExternalRunner } from "../exec/runner.js";
import type { DependenciesConfig } from "../types/config.js";
import type { Failure } from "../types/failure.js";
import type { RuntimeInfo } from "./runtime-probe.js";

export type DependencyManifest = {
  /** As configured, relative to the app dir; passed to the package manager verbatim. */
  path: string;
  packages: readonly string[];
};

export type ManifestResult = { ok: true; manifest: DependencyManifest } | { ok: false; error: Failure };

export type EnsureResult = { ok: true; installed: boolean } | { ok: false; error: Failure };

/**
 * Package identifiers from a requirements-style file, in order.
 * Comments, blank lines and option lines (`-r`, `--index-url`) are skipped.
 */
export function parseManifest(text: string): string[] {
  const packages: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, "").trim();
    if (line.length === 0 || line.startsWith("-")) continue;
    packages.push(line);
  }
  return packages;
}

export function loadManifest(appDir: string, file: string): ManifestResult {
  const fullPath = path.resolve(appDir, file);
  if (!fs.existsSync(fullPath)) {
    return {
      ok: false,
      error: {
        code: "MANIFEST_MISSING",
        message: `Dependency manifest not found: ${fullPath}`,
        remediation: `Run this from the application directory, or pass --app-dir pointing at the folder that contains ${file}.`,
      },
    };
  }
  return { ok: true, manifest: { path: file, packages: parseManifest(fs.readFileSync(fullPath, "utf8")) } };
}

/**
 * Dependency resolver.
 *
 * Presence of the single sentinel package is taken to mean the whole manifest
 * is installed. This misses a manifest that is only partly installed; the
 * trade-off keeps every start after the first one fast.
 */
export class DependencyResolver {
  constructor(
    private readonly settings: DependenciesConfig,
    private readonly runtime: RuntimeInfo,
    private readonly runner: ExternalRunner,
    private readonly appDir: string,
  ) {}

  /** True when the sentinel package imports cleanly. */
  async isSatisfied(): Promise<boolean> {
    const status = await this.runner.run(this.runtime.command, ["-c", `import ${this.settings.sentinel}`], {
      stdio: "capture",
      cwd: this.appDir,
    });
    return status.kind === "exited" && status.code === 0;
  }

  installArgs(manifest: DependencyManifest): string[] {
    return [...this.settings.install_args, manifest.path];
  }

  async ensureDependencies(manifest: DependencyManifest): Promise<EnsureResult> {
    if (await this.isSatisfied()) {
      return { ok: true, installed: false };
    }

    const args = this.installArgs(manifest);
    const status = await this.runner.run(this.runtime.command, args, { stdio: "quiet", cwd: this.appDir });
    if (status.kind === "exited" && status.code === 0) {
      return { ok: true, installed: true };
    }

    const reason =
      status.kind === "exited"
        ? `exit code ${status.code}`
        : status.kind === "signaled"
          ? `killed by ${status.signal}`
          : `${this.runtime.command} could not be started`;

    return {
      ok: false,
      error: {
        code: "INSTALL_FAILED",
        message: `Installing ${manifest.packages.length} package(s) from ${manifest.path} failed (${reason}).`,
        remediation: `Check your network connection and permissions, then run from ${this.appDir}: ${formatCommand(this.runtime.command, args)}`,
      },
    };
  }
}
