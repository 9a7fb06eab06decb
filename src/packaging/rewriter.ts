import fs from "node:fs";
import path from "node:path";
import type { SanitizationRule } from "./rules.js";

export type RewriteRule = Extract<SanitizationRule, { kind: "rewrite-pattern" }>;

export type RewriteOutcome =
  | { status: "skipped"; file: string }
  | { status: "unchanged"; file: string }
  | { status: "rewritten"; file: string; count: number };

// Module-level forms that bind the name `os`; `from os import environ` and an
// import indented inside a function do not.
const OS_IMPORT = /^import[ \t]+(?:[A-Za-z_][\w.]*[ \t]*,[ \t]*)*os(?:\.[\w.]+)?[ \t]*(?:,|#|$)/m;

/**
 * Add `import os` when the module does not import it yet, after any shebang,
 * encoding line and `from __future__` imports.
 */
export function ensureOsImport(source: string): string {
  if (OS_IMPORT.test(source)) return source;

  const lines = source.split("\n");
  let insertAt = 0;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (i === insertAt && /^#(?:!|.*coding[:=])/.test(line)) {
      insertAt = i + 1;
    } else if (/^from[ \t]+__future__[ \t]+import\b/.test(line)) {
      insertAt = i + 1;
    }
  }
  lines.splice(insertAt, 0, "import os");
  return lines.join("\n");
}

export function countLiteralCredentials(text: string, rule: RewriteRule): number {
  return (text.match(rule.pattern) ?? []).length;
}

/**
 * 1-based numbers of lines that assign the credential variable anything other
 * than the environment lookup. Empty after a complete rewrite.
 */
export function findUnsafeAssignments(text: string, rule: RewriteRule): number[] {
  const unsafe: number[] = [];
  text.split("\n").forEach((rawLine, i) => {
    const line = rawLine.replace(/\r$/, "");
    if (rule.assignment.test(line) && !rule.lookup.test(line)) unsafe.push(i + 1);
  });
  return unsafe;
}

/**
 * Replace literal credential assignments in the rule's file with an
 * environment lookup. A missing file is skipped, not an error.
 */
export function applyRewrite(root: string, rule: RewriteRule): RewriteOutcome {
  const filePath = path.join(root, rule.file);
  if (!fs.existsSync(filePath)) {
    return { status: "skipped", file: rule.file };
  }

  const original = fs.readFileSync(filePath, "utf8");
  const count = countLiteralCredentials(original, rule);
  if (count === 0) {
    return { status: "unchanged", file: rule.file };
  }

  const rewritten = ensureOsImport(original.replace(rule.pattern, rule.replacement));
  fs.writeFileSync(filePath, rewritten, "utf8");
  return { status: "rewritten", file: rule.file, count };
}
