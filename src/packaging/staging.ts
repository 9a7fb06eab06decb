import fs from "node:fs";
import path from "node:path";
import { redactSensitiveInfo } from "../security/sanitize.js";
import type { PackagingStage } from "../types/failure.js";

/** Temporary sanitized copy of the application tree. */
export type StagingTree = {
  root: string;
  /** Delete-path patterns applied to this tree. */
  excluded: readonly string[];
};

/** Raised inside the packaging pipeline; carries the stage that broke. */
export class PackagingError extends Error {
  constructor(
    readonly stage: PackagingStage,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PackagingError";
  }
}

/** Message of a thrown value, with credentials masked. */
export function errorMessage(e: unknown): string {
  return redactSensitiveInfo(e instanceof Error ? e.message : String(e));
}

/** Remove a leftover staging directory and create an empty one. */
export function prepareStaging(root: string): void {
  try {
    fs.rmSync(root, { recursive: true, force: true });
    fs.mkdirSync(root, { recursive: true });
  } catch (e: unknown) {
    throw new PackagingError("stage", `Could not reset staging directory ${root}: ${errorMessage(e)}`, { cause: e });
  }
}

export function removeStaging(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

/** Remove `dir` if nothing is left in it. */
export function removeIfEmpty(dir: string): void {
  try {
    fs.rmdirSync(dir);
  } catch (e: unknown) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    if (code !== "ENOTEMPTY" && code !== "EEXIST" && code !== "ENOENT") throw e;
  }
}

/**
 * Run `fn` against a fresh staging directory. The directory, and its parent
 * once empty, are removed on every exit path, including a throw from `fn`.
 * A cleanup error goes to `onCleanupError`; it never replaces the result of
 * `fn` or the error it threw.
 */
export async function withStagingTree<T>(
  root: string,
  excluded: readonly string[],
  fn: (tree: StagingTree) => Promise<T>,
  onCleanupError: (error: unknown) => void,
): Promise<T> {
  prepareStaging(root);
  try {
    return await fn({ root, excluded });
  } finally {
    try {
      removeStaging(root);
      removeIfEmpty(path.dirname(root));
    } catch (e: unknown) {
      onCleanupError(e);
    }
  }
}
