import type { ExitStatus, ExternalRunner } from "../exec/runner.js";
import type { RuntimeConfig } from "../types/config.js";
import type { Failure } from "../types/failure.js";

export type RuntimeInfo = {
  present: true;
  /** The executable that answered, reused by later stages. */
  command: string;
  version: string;
};

export type ProbeResult = { ok: true; runtime: RuntimeInfo } | { ok: false; error: Failure };

/** First dotted version number in a `--version` banner ("Python 3.11.4" → "3.11.4"). */
export function parseVersion(output: string): string | null {
  const m = /\b(\d+)\.(\d+)(?:\.(\d+))?\b/.exec(output);
  return m ? m[0] : null;
}

/** Numeric comparison of dotted versions; missing components count as 0. */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map((n) => parseInt(n, 10));
  const pb = b.split(".").map((n) => parseInt(n, 10));
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/**
 * Runtime probe: finds a script runtime new enough to run the dashboard.
 * Never installs anything: a missing runtime is reported with instructions.
 */
export class RuntimeProbe {
  constructor(
    private readonly settings: RuntimeConfig,
    private readonly runner: ExternalRunner,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  async probe(): Promise<ProbeResult> {
    let outdated: string | null = null;
    const unrunnable: string[] = [];

    for (const command of this.settings.commands) {
      let status: ExitStatus;
      try {
        status = await this.runner.run(command, this.settings.version_args, { stdio: "capture" });
      } catch (e: unknown) {
        // EACCES and similar spawn errors skip the candidate like a missing one.
        unrunnable.push(`${command} (${e instanceof Error ? e.message : String(e)})`);
        continue;
      }
      if (status.kind !== "exited" || status.code !== 0) continue;

      const version = parseVersion(status.output);
      if (!version) continue;

      if (compareVersions(version, this.settings.min_version) < 0) {
        outdated ??= `${command} ${version}`;
        continue;
      }

      return { ok: true, runtime: { present: true, command, version } };
    }

    const { name, min_version, commands } = this.settings;
    let message = outdated
      ? `${name} ${min_version} or newer is required, but only ${outdated} was found.`
      : `${name} ${min_version} or newer is required, but none was found (tried: ${commands.join(", ")}).`;
    if (unrunnable.length > 0) {
      message += ` Could not run ${unrunnable.join(", ")}.`;
    }

    return {
      ok: false,
      error: {
        code: "RUNTIME_MISSING",
        message,
        remediation: `Install ${name} ${min_version}+ and run this again. ${this.installHint()}`,
      },
    };
  }

  /** Platform-specific install instruction, falling back to the `default` hint. */
  installHint(): string {
    const hints = this.settings.install_hints;
    return hints[this.platform] ?? hints.default ?? "";
  }
}
