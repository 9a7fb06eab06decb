import { spawn, type StdioOptions } from "node:child_process";

/**
 * - `capture`: stdout and stderr collected into `output` (version probes).
 * - `quiet`: stdout discarded, stderr passed through (installers).
 * - `inherit`: child attached to the terminal (foreground services).
 */
export type StdioMode = "capture" | "quiet" | "inherit";

export type RunOptions = {
  stdio: StdioMode;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ExitStatus =
  | { kind: "exited"; code: number; output: string }
  | { kind: "signaled"; signal: NodeJS.Signals }
  | { kind: "not_found" };

/** The only way the pipelines touch external programs. */
export interface ExternalRunner {
  run(command: string, args: readonly string[], opts: RunOptions): Promise<ExitStatus>;
}

const STDIO: Record<StdioMode, StdioOptions> = {
  capture: ["ignore", "pipe", "pipe"],
  quiet: ["ignore", "ignore", "inherit"],
  inherit: "inherit",
};

/** ExternalRunner backed by child_process.spawn, never through a shell. */
export class ProcessRunner implements ExternalRunner {
  run(command: string, args: readonly string[], opts: RunOptions): Promise<ExitStatus> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: opts.cwd,
        env: opts.env ?? process.env,
        stdio: STDIO[opts.stdio],
        shell: false,
        windowsHide: opts.stdio !== "inherit",
      });

      const chunks: string[] = [];
      child.stdout?.setEncoding("utf8").on("data", (chunk: string) => chunks.push(chunk));
      child.stderr?.setEncoding("utf8").on("data", (chunk: string) => chunks.push(chunk));

      child.once("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "ENOENT") {
          resolve({ kind: "not_found" });
        } else {
          reject(err);
        }
      });

      child.once("close", (code, signal) => {
        if (signal) {
          resolve({ kind: "signaled", signal });
        } else {
          resolve({ kind: "exited", code: code ?? 1, output: chunks.join("") });
        }
      });
    });
  }
}

/** Render a command line the way a user would type it. */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
