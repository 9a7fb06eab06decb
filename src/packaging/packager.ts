import fs from "node:fs";
import path from "node:path";
import { diag, formatBytes, type Reporter } from "../output/reporter.js";
import { sanitizePathComponent } from "../security/sanitize.js";
import type { PackagingConfig } from "../types/config.js";
import { STAGE_FAILURE_CODES, type Failure, type PackagingStage } from "../types/failure.js";
import { computeSha256 } from "./checksum.js";
import { ARCHIVE_EXTENSIONS, DEFAULT_WRITERS, type ArchiveWriter } from "./archive.js";
import { applyRewrite, findUnsafeAssignments, type RewriteOutcome, type RewriteRule } from "./rewriter.js";
import { buildRules, deletePatterns, type SanitizationRule } from "./rules.js";
import { findExcluded, sanitizeTree } from "./sanitizer.js";
import { PackagingError, errorMessage, withStagingTree, type StagingTree } from "./staging.js";
import { copyTree } from "./tree.js";

export type PackageSuccess = {
  ok: true;
  archivePath: string;
  bytes: number;
  sha256: string;
  removed: string[];
  rewrite: RewriteOutcome;
};

export type PackageResult = PackageSuccess | { ok: false; error: Failure };

export type PackagerOptions = {
  reporter: Reporter;
  /** Base for the relative output and staging paths in the settings. */
  cwd?: string;
  writers?: Partial<Record<PackagingConfig["format"], ArchiveWriter>>;
};

const REMEDIATION: Record<PackagingStage, string> = {
  stage: "Close any program using the staging directory, or delete it by hand, then retry.",
  copy: "Check that the source directory exists and is readable.",
  sanitize: "Delete the listed paths from the source tree by hand, then retry.",
  rewrite: "Replace the credential in the config file with an environment lookup by hand, then retry.",
  archive: "Check free disk space and write permission on the output directory.",
};

/**
 * Release packager: copies the application into a staging directory, strips
 * caches and secrets, replaces the literal API token with an environment
 * lookup, and compresses the result into `<output_dir>/<name>.<ext>`.
 *
 * Stages run strictly in order; the staging directory is always removed.
 * Not reentrant: two runs with the same name and staging root will collide.
 */
export class ReleasePackager {
  private readonly rules: SanitizationRule[];
  private readonly cwd: string;
  private readonly reporter: Reporter;
  private readonly writer: ArchiveWriter;

  constructor(
    private readonly settings: PackagingConfig,
    opts: PackagerOptions,
  ) {
    this.rules = buildRules(settings);
    this.cwd = opts.cwd ?? process.cwd();
    this.reporter = opts.reporter;
    this.writer = opts.writers?.[settings.format] ?? DEFAULT_WRITERS[settings.format];
  }

  archivePathFor(packageName: string): string {
    return path.resolve(this.cwd, this.settings.output_dir, `${packageName}${ARCHIVE_EXTENSIONS[this.settings.format]}`);
  }

  async package(sourceTree: string, packageName: string): Promise<PackageResult> {
    let name: string;
    try {
      name = packageDirName(packageName);
    } catch (e: unknown) {
      return {
        ok: false,
        error: { code: "INVALID_ARGS", message: errorMessage(e), remediation: "Use a plain file name such as dashboard-v1." },
      };
    }

    const source = path.resolve(this.cwd, sourceTree);
    const stagingRoot = path.resolve(this.cwd, this.settings.staging_root);
    const outputDir = path.resolve(this.cwd, this.settings.output_dir);
    const archivePath = this.archivePathFor(name);

    try {
      const { removed, rewrite } = await withStagingTree(
        path.join(stagingRoot, name),
        deletePatterns(this.rules),
        async (tree) => {
          this.copy(source, tree, [stagingRoot, outputDir]);
          const removedPaths = this.sanitize(tree);
          const outcome = this.rewrite(tree);
          await this.archive(tree, outputDir, archivePath);
          return { removed: removedPaths, rewrite: outcome };
        },
        (e) => this.reportCleanupFailure(stagingRoot, e),
      );

      const bytes = fs.statSync(archivePath).size;
      const sha256 = await computeSha256(archivePath);
      this.reporter.emit(
        diag("info", "PACKAGE_CREATED", `Created ${archivePath} (${formatBytes(bytes)})`, {
          path: archivePath,
          details: { bytes, sha256 },
        }),
      );
      return { ok: true, archivePath, bytes, sha256, removed, rewrite };
    } catch (e: unknown) {
      if (!(e instanceof PackagingError)) throw e;
      return {
        ok: false,
        error: {
          code: STAGE_FAILURE_CODES[e.stage],
          stage: e.stage,
          message: `Packaging failed at ${e.stage}: ${e.message}`,
          remediation: REMEDIATION[e.stage],
        },
      };
    }
  }

  private reportCleanupFailure(stagingRoot: string, e: unknown): void {
    this.reporter.emit(
      diag("warn", "STAGING_CLEANUP_FAILED", `Could not remove the staging directory: ${errorMessage(e)}`, {
        path: stagingRoot,
        remediation: `Delete ${stagingRoot} by hand.`,
      }),
    );
  }

  private copy(source: string, tree: StagingTree, skip: string[]): void {
    if (!fs.existsSync(source) || !fs.statSync(source).isDirectory()) {
      throw new PackagingError("copy", `Source directory not found: ${source}`);
    }
    try {
      const count = copyTree(source, tree.root, skip);
      this.reporter.emit(diag("info", "PACKAGE_COPIED", `Copied ${count} entries from ${source}`));
    } catch (e: unknown) {
      throw new PackagingError("copy", errorMessage(e), { cause: e });
    }
  }

  private sanitize(tree: StagingTree): string[] {
    let removed: string[];
    try {
      removed = sanitizeTree(tree.root, tree.excluded);
    } catch (e: unknown) {
      throw new PackagingError("sanitize", errorMessage(e), { cause: e });
    }

    const leftover = findExcluded(tree.root, tree.excluded);
    if (leftover.length > 0) {
      throw new PackagingError("sanitize", `Excluded paths still present: ${leftover.join(", ")}`);
    }

    for (const rel of removed) {
      this.reporter.emit(diag("info", "PACKAGE_REMOVED", `Removed ${rel}`, { path: rel }));
    }
    return removed;
  }

  private rewrite(tree: StagingTree): RewriteOutcome {
    const rule = this.rules.find((r): r is RewriteRule => r.kind === "rewrite-pattern");
    if (!rule) return { status: "skipped", file: this.settings.credential.file };

    let outcome: RewriteOutcome;
    try {
      outcome = applyRewrite(tree.root, rule);
    } catch (e: unknown) {
      throw new PackagingError("rewrite", errorMessage(e), { cause: e });
    }

    if (outcome.status === "skipped") {
      this.reporter.emit(diag("info", "REWRITE_SKIPPED", `${rule.file} not present; no credential to rewrite`));
      return outcome;
    }

    const { variable, env_var } = this.settings.credential;
    const unsafe = findUnsafeAssignments(fs.readFileSync(path.join(tree.root, rule.file), "utf8"), rule);
    if (unsafe.length > 0) {
      throw new PackagingError(
        "rewrite",
        `${rule.file} still assigns ${variable} a value that is not read from ${env_var} (line ${unsafe.join(", ")})`,
      );
    }
    if (outcome.status === "rewritten") {
      this.reporter.emit(diag("info", "REWRITE_APPLIED", `${rule.file}: ${variable} now reads ${env_var}`));
    }
    return outcome;
  }

  private async archive(tree: StagingTree, outputDir: string, archivePath: string): Promise<void> {
    try {
      fs.mkdirSync(outputDir, { recursive: true });
      fs.rmSync(archivePath, { force: true });
      await this.writer(tree.root, archivePath);
    } catch (e: unknown) {
      discardPartial(archivePath);
      throw new PackagingError("archive", errorMessage(e), { cause: e });
    }

    if (!fs.existsSync(archivePath) || fs.statSync(archivePath).size === 0) {
      discardPartial(archivePath);
      throw new PackagingError("archive", `No archive was written to ${archivePath}`);
    }
  }
}

/** The archive's top-level directory; a plain name that is not hidden. */
function packageDirName(packageName: string): string {
  const name = sanitizePathComponent(packageName);
  if (name.startsWith(".")) {
    throw new Error(`Package name must not start with a dot: ${name}`);
  }
  return name;
}

function discardPartial(archivePath: string): void {
  if (fs.existsSync(archivePath)) fs.rmSync(archivePath, { force: true });
}
