import path from "node:path";
import { bootstrap, doctor } from "../bootstrap/pipeline.js";
import { ProcessRunner, type ExternalRunner } from "../exec/runner.js";
import type { Reporter } from "../output/reporter.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { resolveConfig, type ConfigOpts } from "./shared.js";

export type StartOpts = ConfigOpts & {
  appDir?: string;
  reporter: Reporter;
  runner?: ExternalRunner;
  platform?: NodeJS.Platform;
};

/** `dashctl start`: probe, install if needed, run the dashboard until it exits. */
export async function start(opts: StartOpts): Promise<ExitCode> {
  const config = resolveConfig(opts, opts.reporter);
  if (!config) return EXIT.FAILURE;

  const outcome = await bootstrap({
    config,
    runner: opts.runner ?? new ProcessRunner(),
    reporter: opts.reporter,
    appDir: opts.appDir ? path.resolve(opts.appDir) : undefined,
    platform: opts.platform,
  });
  return outcome.exitCode;
}

/** `dashctl doctor`: what `start` would do, without doing it. */
export async function check(opts: StartOpts): Promise<ExitCode> {
  const config = resolveConfig(opts, opts.reporter);
  if (!config) return EXIT.FAILURE;

  const outcome = await doctor({
    config,
    runner: opts.runner ?? new ProcessRunner(),
    reporter: opts.reporter,
    appDir: opts.appDir ? path.resolve(opts.appDir) : undefined,
    platform: opts.platform,
  });
  return outcome.exitCode;
}
