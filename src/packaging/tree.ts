import fs from "node:fs";
import path from "node:path";

export type TreeEntry = {
  /** Relative to the tree root, always with `/` separators. */
  path: string;
  kind: "file" | "dir" | "symlink";
  size: number;
};

export function toPosix(relPath: string): string {
  return relPath.split(path.sep).join("/");
}

/** Every entry under `root`, depth first, parents before children. */
export function listTree(root: string): TreeEntry[] {
  const out: TreeEntry[] = [];
  collect(root, root, out);
  return out;
}

function collect(baseDir: string, currentDir: string, out: TreeEntry[]): void {
  const entries = fs.readdirSync(currentDir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    const rel = toPosix(path.relative(baseDir, fullPath));
    if (entry.isSymbolicLink()) {
      out.push({ path: rel, kind: "symlink", size: 0 });
    } else if (entry.isDirectory()) {
      out.push({ path: rel, kind: "dir", size: 0 });
      collect(baseDir, fullPath, out);
    } else if (entry.isFile()) {
      out.push({ path: rel, kind: "file", size: fs.statSync(fullPath).size });
    }
  }
}

/**
 * Recursive copy preserving relative structure. Symlinks are recreated, not
 * followed. `skip` holds absolute paths that are left out with everything
 * beneath them.
 */
export function copyTree(source: string, dest: string, skip: readonly string[] = []): number {
  const skipped = new Set(skip.map((p) => path.resolve(p)));
  fs.mkdirSync(dest, { recursive: true });
  return copyDir(source, dest, skipped);
}

function copyDir(source: string, dest: string, skipped: Set<string>): number {
  let copied = 0;
  for (const entry of fs.readdirSync(source, { withFileTypes: true })) {
    const from = path.join(source, entry.name);
    const to = path.join(dest, entry.name);
    if (skipped.has(path.resolve(from))) continue;

    if (entry.isSymbolicLink()) {
      fs.symlinkSync(fs.readlinkSync(from), to);
      copied++;
    } else if (entry.isDirectory()) {
      fs.mkdirSync(to);
      copied += copyDir(from, to, skipped);
    } else if (entry.isFile()) {
      fs.copyFileSync(from, to);
      copied++;
    }
  }
  return copied;
}
