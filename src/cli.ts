#!/usr/bin/env node

import { Command } from "commander";
import { StreamReporter, type OutputFormat } from "./output/reporter.js";
import type { ArchiveFormat } from "./types/config.js";
import { start, check } from "./commands/start.js";
import { packageRelease } from "./commands/package.js";
import { validate } from "./commands/validate.js";
import { parseArchiveFormat, parseOutputFormat } from "./commands/shared.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };

const program = new Command();

program
  .name("dashctl")
  .description("Set up, run and package the dashboard")
  .version("0.1.0");

program
  .command("start")
  .description("Check the runtime, install dependencies if needed, and run the dashboard")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--app-dir <path>", "Application directory (default: app_dir from config)")
  .option("--format <format>", "Output format: human|jsonl", parseOutputFormat, "human")
  .action(async (opts: CommonOpts & { appDir?: string }) => {
    const exitCode = await start({
      configDir: opts.config,
      envName: opts.env,
      appDir: opts.appDir,
      reporter: new StreamReporter(opts.format),
    });
    process.exit(exitCode);
  });

program
  .command("doctor")
  .description("Report whether the runtime and dependencies are ready, without changing anything")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--app-dir <path>", "Application directory (default: app_dir from config)")
  .option("--format <format>", "Output format: human|jsonl", parseOutputFormat, "human")
  .action(async (opts: CommonOpts & { appDir?: string }) => {
    const exitCode = await check({
      configDir: opts.config,
      envName: opts.env,
      appDir: opts.appDir,
      reporter: new StreamReporter(opts.format),
    });
    process.exit(exitCode);
  });

program
  .command("package")
  .description("Build a sanitized, shareable archive of the application")
  .argument("<name>", "Package name; also the archive's top-level directory")
  .option("--source <path>", "Application tree to package (default: app_dir from config)")
  .option("--out <path>", "Output directory (default: packaging.output_dir)")
  .option("--archive-format <format>", "Archive format: zip|tar.gz", parseArchiveFormat)
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", parseOutputFormat, "human")
  .action(async (name: string, opts: CommonOpts & { source?: string; out?: string; archiveFormat?: ArchiveFormat }) => {
    const { exitCode } = await packageRelease({
      name,
      source: opts.source,
      outDir: opts.out,
      archiveFormat: opts.archiveFormat,
      configDir: opts.config,
      envName: opts.env,
      reporter: new StreamReporter(opts.format),
    });
    process.exit(exitCode);
  });

program
  .command("validate")
  .description("Validate the layered configuration")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", parseOutputFormat, "human")
  .action((opts: CommonOpts) => {
    process.exit(validate({ configDir: opts.config, envName: opts.env, reporter: new StreamReporter(opts.format) }));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
