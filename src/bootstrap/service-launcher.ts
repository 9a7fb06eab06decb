import { setTimeout as delay } from "node:timers/promises";
import type { ExternalRunner, ExitStatus } from "../exec/runner.js";
import { diag, type Reporter } from "../output/reporter.js";
import { redactSensitiveInfo } from "../security/sanitize.js";
import type { LaunchConfig } from "../types/config.js";
import type { RuntimeInfo } from "./runtime-probe.js";

/**
 * How the foreground service ended. Every variant except `not_started` is a
 * normal shutdown: the service is supervised but never restarted.
 */
export type LaunchResult =
  | { kind: "normal_exit"; code: number }
  | { kind: "signaled"; signal: string }
  | { kind: "not_started"; command: string };

export function toLaunchResult(status: ExitStatus, command: string): LaunchResult {
  switch (status.kind) {
    case "exited":
      return { kind: "normal_exit", code: status.code };
    case "signaled":
      return { kind: "signaled", signal: status.signal };
    case "not_found":
      return { kind: "not_started", command };
  }
}

/** The platform's "open this URL" command. */
export function browserCommand(platform: NodeJS.Platform, url: string): { command: string; args: string[] } {
  if (platform === "darwin") return { command: "open", args: [url] };
  if (platform === "win32") return { command: "cmd", args: ["/c", "start", "", url] };
  return { command: "xdg-open", args: [url] };
}

export function localUrl(port: number): string {
  return `http://localhost:${port}`;
}

/**
 * Service launcher: runs the dashboard in the foreground and blocks until it
 * exits. There is no timeout and no signal handling: Ctrl+C or closing the
 * terminal reaches the child directly.
 */
export class ServiceLauncher {
  constructor(
    private readonly settings: LaunchConfig,
    private readonly runtime: RuntimeInfo,
    private readonly runner: ExternalRunner,
    private readonly reporter: Reporter,
    private readonly appDir: string,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  serviceArgs(entrypoint: string, port: number, headless: boolean): string[] {
    return ["-m", "streamlit", "run", entrypoint, "--server.port", String(port), "--server.headless", String(headless)];
  }

  async launch(entrypoint: string, port: number, headless: boolean): Promise<LaunchResult> {
    const url = localUrl(port);
    this.reporter.emit(diag("info", "SERVICE_STARTING", `Starting dashboard at ${url} (press Ctrl+C to stop)`, { details: { url } }));

    const stopped = new AbortController();
    const service = this.runner
      .run(this.runtime.command, this.serviceArgs(entrypoint, port, headless), { stdio: "inherit", cwd: this.appDir })
      .finally(() => stopped.abort());

    const browser = this.settings.open_browser ? this.openBrowser(url, stopped.signal) : Promise.resolve();

    const status = await service;
    await browser;
    return toLaunchResult(status, this.runtime.command);
  }

  /** Opens the dashboard once the service had time to bind. Never fails the launch. */
  private async openBrowser(url: string, stopped: AbortSignal): Promise<void> {
    try {
      await delay(this.settings.browser_delay_ms, undefined, { signal: stopped });
    } catch (e: unknown) {
      if (stopped.aborted) return;
      throw e;
    }

    const { command, args } = browserCommand(this.platform, url);
    let reason: string | null = null;
    try {
      const status = await this.runner.run(command, args, { stdio: "quiet" });
      if (status.kind === "not_found") reason = `${command} not found`;
      else if (status.kind === "signaled") reason = `${command} killed by ${status.signal}`;
      else if (status.code !== 0) reason = `${command} exited with code ${status.code}`;
    } catch (e: unknown) {
      reason = redactSensitiveInfo(e instanceof Error ? e.message : String(e));
    }

    if (reason !== null) {
      this.reporter.emit(
        diag("warn", "BROWSER_OPEN_FAILED", "Could not open a browser automatically.", {
          remediation: `Open ${url} in your browser.`,
          details: { reason },
        }),
      );
    }
  }
}
