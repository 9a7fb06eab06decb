import type { Writable } from "node:stream";
import { sanitizeLogMessage } from "../security/sanitize.js";
import type { Failure } from "../types/failure.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  remediation?: string;
  path?: string;
  details?: Record<string, unknown>;
};

/** Sink for every user-facing line the pipelines produce. */
export interface Reporter {
  emit(diagnostic: Diagnostic): void;
}

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "remediation" | "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function failureDiagnostic(failure: Failure, level: Diagnostic["level"] = "error"): Diagnostic {
  return diag(level, failure.code, failure.message, {
    remediation: failure.remediation,
    details: failure.stage ? { stage: failure.stage } : undefined,
  });
}

/**
 * Writes diagnostics to the terminal. `human` prints plain lines (warn/error on
 * stderr), `jsonl` prints one JSON object per line on stdout.
 */
export class StreamReporter implements Reporter {
  constructor(
    private readonly format: OutputFormat,
    private readonly stdout: Writable = process.stdout,
    private readonly stderr: Writable = process.stderr,
    private readonly now: () => Date = () => new Date(),
  ) {}

  emit(d: Diagnostic): void {
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify({ ts: this.now().toISOString(), ...d }) + "\n");
      return;
    }

    const out = d.level === "info" ? this.stdout : this.stderr;
    const prefix = d.level === "info" ? "" : `${d.level.toUpperCase()}: `;
    out.write(`${prefix}${sanitizeLogMessage(d.message)}\n`);
    if (d.remediation) out.write(`  → ${d.remediation}\n`);
  }
}

/** Human-readable size: 1536 → "1.5 KB". */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}
