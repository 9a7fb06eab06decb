import path from "node:path";
import type { ExternalRunner } from "../exec/runner.js";
import { diag, failureDiagnostic, type Reporter } from "../output/reporter.js";
import type { DashctlConfig } from "../types/config.js";
import type { Failure } from "../types/failure.js";
import { EXIT, type ExitCode } from "../commands/exit-codes.js";
import { RuntimeProbe } from "./runtime-probe.js";
import { DependencyResolver, loadManifest } from "./dependency-resolver.js";
import { ServiceLauncher, type LaunchResult } from "./service-launcher.js";

export type BootstrapStage = "probe" | "dependencies" | "launch";

export type BootstrapContext = {
  config: DashctlConfig;
  runner: ExternalRunner;
  reporter: Reporter;
  /** Defaults to `config.app_dir` resolved against the working directory. */
  appDir?: string;
  platform?: NodeJS.Platform;
};

export type BootstrapOutcome = {
  exitCode: ExitCode;
  /** Last stage entered. */
  stage: BootstrapStage;
  launch?: LaunchResult;
  error?: Failure;
};

function resolveAppDir(ctx: BootstrapContext): string {
  return ctx.appDir ?? path.resolve(ctx.config.app_dir);
}

function fail(ctx: BootstrapContext, stage: BootstrapStage, error: Failure): BootstrapOutcome {
  ctx.reporter.emit(failureDiagnostic(error));
  return { exitCode: EXIT.FAILURE, stage, error };
}

/**
 * Bootstrap: probe the runtime, make sure dependencies are installed, then run
 * the dashboard in the foreground. Each stage gates the next; the first
 * failure ends the run with exit code 1.
 */
export async function bootstrap(ctx: BootstrapContext): Promise<BootstrapOutcome> {
  const { config, runner, reporter } = ctx;
  const appDir = resolveAppDir(ctx);

  const probe = await new RuntimeProbe(config.runtime, runner, ctx.platform).probe();
  if (!probe.ok) return fail(ctx, "probe", probe.error);
  const { runtime } = probe;
  reporter.emit(diag("info", "RUNTIME_FOUND", `Found ${config.runtime.name} ${runtime.version} (${runtime.command})`));

  const manifest = loadManifest(appDir, config.dependencies.manifest);
  if (!manifest.ok) return fail(ctx, "dependencies", manifest.error);

  const resolver = new DependencyResolver(config.dependencies, runtime, runner, appDir);
  reporter.emit(diag("info", "DEPENDENCIES_CHECKING", `Checking dependencies (${config.dependencies.sentinel})...`));
  const deps = await resolver.ensureDependencies(manifest.manifest);
  if (!deps.ok) return fail(ctx, "dependencies", deps.error);
  reporter.emit(
    deps.installed
      ? diag("info", "DEPENDENCIES_INSTALLED", `Installed ${manifest.manifest.packages.length} package(s) from ${manifest.manifest.path}`)
      : diag("info", "DEPENDENCIES_PRESENT", "Dependencies already installed"),
  );

  const { entrypoint, port, headless } = config.launch;
  const launcher = new ServiceLauncher(config.launch, runtime, runner, reporter, appDir, ctx.platform);
  const launch = await launcher.launch(entrypoint, port, headless);

  if (launch.kind === "not_started") {
    return fail(ctx, "launch", {
      code: "LAUNCH_ABNORMAL",
      message: `The dashboard could not be started: ${launch.command} is no longer available.`,
      remediation: "Re-run this command; if it keeps failing, reinstall the runtime.",
    });
  }

  if (launch.kind === "signaled" || launch.code !== 0) {
    const how = launch.kind === "signaled" ? `signal ${launch.signal}` : `code ${launch.code}`;
    reporter.emit(diag("warn", "LAUNCH_ABNORMAL", `Dashboard exited with ${how}`, { details: { ...launch } }));
  }
  reporter.emit(diag("info", "SERVICE_STOPPED", "Dashboard stopped. You can close this window."));
  return { exitCode: EXIT.SUCCESS, stage: "launch", launch };
}

export type DoctorOutcome = {
  exitCode: ExitCode;
  runtime: { found: boolean; command?: string; version?: string };
  dependencies: { satisfied: boolean } | null;
};

/**
 * Read-only health check: reports what `start` would do without installing
 * or launching anything.
 */
export async function doctor(ctx: BootstrapContext): Promise<DoctorOutcome> {
  const { config, runner, reporter } = ctx;
  const appDir = resolveAppDir(ctx);

  const probe = await new RuntimeProbe(config.runtime, runner, ctx.platform).probe();
  if (!probe.ok) {
    reporter.emit(failureDiagnostic(probe.error));
    return { exitCode: EXIT.FAILURE, runtime: { found: false }, dependencies: null };
  }
  const { runtime } = probe;
  reporter.emit(diag("info", "RUNTIME_FOUND", `Found ${config.runtime.name} ${runtime.version} (${runtime.command})`));
  const runtimeReport = { found: true, command: runtime.command, version: runtime.version };

  const manifest = loadManifest(appDir, config.dependencies.manifest);
  if (!manifest.ok) {
    reporter.emit(failureDiagnostic(manifest.error));
    return { exitCode: EXIT.FAILURE, runtime: runtimeReport, dependencies: null };
  }

  const satisfied = await new DependencyResolver(config.dependencies, runtime, runner, appDir).isSatisfied();
  reporter.emit(
    satisfied
      ? diag("info", "DEPENDENCIES_PRESENT", "Dependencies already installed")
      : diag("warn", "DEPENDENCIES_MISSING", `${config.dependencies.sentinel} is not installed; start will install ${manifest.manifest.path}`),
  );
  return { exitCode: EXIT.SUCCESS, runtime: runtimeReport, dependencies: { satisfied } };
}
