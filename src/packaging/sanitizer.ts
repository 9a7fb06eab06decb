import fs from "node:fs";
import path from "node:path";
import { matchesExcluded } from "./rules.js";
import { listTree } from "./tree.js";

/**
 * Delete every path under `root` that matches an excluded pattern. Matching
 * entries are removed whole and not descended into. Absent paths are not an
 * error. Returns the removed tree-relative paths.
 */
export function sanitizeTree(root: string, patterns: readonly string[]): string[] {
  const removed: string[] = [];
  walk(root, "", patterns, removed);
  return removed;
}

function walk(root: string, relDir: string, patterns: readonly string[], removed: string[]): void {
  const dir = relDir ? path.join(root, relDir) : root;
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (matchesExcluded(rel, patterns)) {
      fs.rmSync(path.join(dir, entry.name), { recursive: true, force: true });
      removed.push(rel);
      continue;
    }
    if (entry.isDirectory()) walk(root, rel, patterns, removed);
  }
}

/** Excluded paths still present under `root`; empty after a clean sanitize. */
export function findExcluded(root: string, patterns: readonly string[]): string[] {
  return listTree(root)
    .filter((entry) => matchesExcluded(entry.path, patterns))
    .map((entry) => entry.path);
}
