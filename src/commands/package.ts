import type { ArchiveWriter } from "../packaging/archive.js";
import { ReleasePackager, type PackageResult } from "../packaging/packager.js";
import { failureDiagnostic, type Reporter } from "../output/reporter.js";
import type { ArchiveFormat, PackagingConfig } from "../types/config.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { resolveConfig, type ConfigOpts } from "./shared.js";

export type PackageOpts = ConfigOpts & {
  name: string;
  /** Defaults to the configured app dir. */
  source?: string;
  outDir?: string;
  archiveFormat?: ArchiveFormat;
  reporter: Reporter;
  cwd?: string;
  writers?: Partial<Record<ArchiveFormat, ArchiveWriter>>;
};

/** `dashctl package <name>`: build one sanitized archive of the app tree. */
export async function packageRelease(opts: PackageOpts): Promise<{ exitCode: ExitCode; result: PackageResult | null }> {
  const config = resolveConfig(opts, opts.reporter);
  if (!config) return { exitCode: EXIT.FAILURE, result: null };

  const settings: PackagingConfig = {
    ...config.packaging,
    output_dir: opts.outDir ?? config.packaging.output_dir,
    format: opts.archiveFormat ?? config.packaging.format,
  };

  const packager = new ReleasePackager(settings, { reporter: opts.reporter, cwd: opts.cwd, writers: opts.writers });
  const result = await packager.package(opts.source ?? config.app_dir, opts.name);
  if (!result.ok) {
    opts.reporter.emit(failureDiagnostic(result.error));
    return { exitCode: EXIT.FAILURE, result };
  }
  return { exitCode: EXIT.SUCCESS, result };
}
