import { minimatch } from "minimatch";
import type { PackagingConfig, CredentialRewriteConfig } from "../types/config.js";

/** One step of sanitization, applied in order to the staging tree. */
export type SanitizationRule =
  | { kind: "delete-path"; pattern: string }
  | {
      kind: "rewrite-pattern";
      file: string;
      /** Literal assignments to replace (global, multiline). */
      pattern: RegExp;
      replacement: string;
      /** Any assignment to the variable, tested per line. */
      assignment: RegExp;
      /** The only assignment allowed to remain. */
      lookup: RegExp;
    };

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** A Python string literal: optional prefix, triple or single quotes, backslash escapes. */
const STRING_LITERAL = [
  String.raw`(?:[rRuUbBfF]{1,2})?(?:`,
  String.raw`"""(?:[^"\\]|\\[\s\S]|"(?!""))*"""`,
  String.raw`|'''(?:[^'\\]|\\[\s\S]|'(?!''))*'''`,
  String.raw`|"(?:[^"\\\r\n]|\\.)*"`,
  String.raw`|'(?:[^'\\\r\n]|\\.)*'`,
  ")",
].join("");

/** `VAR =` or `VAR: annotation =` at the start of a line. Groups: indentation, annotation. */
function assignmentHead(variable: string): string {
  return String.raw`^([ \t]*)${escapeRegExp(variable)}([ \t]*:[^=\r\n]*?)?[ \t]*=(?!=)`;
}

/**
 * Matches `TOKEN = "literal"` at the start of a line, including prefixed,
 * triple-quoted and parenthesised literals and annotated assignments.
 */
export function credentialPattern(variable: string): RegExp {
  return new RegExp(String.raw`${assignmentHead(variable)}[ \t]*(?:\([ \t]*)*${STRING_LITERAL}(?:[ \t]*\))*`, "gm");
}

/** `TOKEN = os.environ.get("TUSHARE_TOKEN", "")`, keeping indentation and any annotation. */
export function credentialReplacement(credential: CredentialRewriteConfig): string {
  return `$1${credential.variable}$2 = os.environ.get("${credential.env_var}", "")`;
}

export function assignmentPattern(variable: string): RegExp {
  return new RegExp(assignmentHead(variable));
}

/** A line holding exactly the replacement form, with an optional trailing comment. */
export function lookupPattern(credential: CredentialRewriteConfig): RegExp {
  return new RegExp(
    String.raw`${assignmentHead(credential.variable)}[ \t]*os\.environ\.get\("${escapeRegExp(credential.env_var)}", ""\)[ \t]*(?:#.*)?$`,
  );
}

/** Delete rules first, in configured order, then the credential rewrite. */
export function buildRules(settings: PackagingConfig): SanitizationRule[] {
  return [
    ...settings.exclude.map((pattern): SanitizationRule => ({ kind: "delete-path", pattern })),
    {
      kind: "rewrite-pattern",
      file: settings.credential.file,
      pattern: credentialPattern(settings.credential.variable),
      replacement: credentialReplacement(settings.credential),
      assignment: assignmentPattern(settings.credential.variable),
      lookup: lookupPattern(settings.credential),
    },
  ];
}

/** Case-sensitive glob match of a tree-relative POSIX path. */
export function matchesExcluded(relPath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relPath, pattern, { dot: true }));
}

export function deletePatterns(rules: readonly SanitizationRule[]): string[] {
  return rules.flatMap((r) => (r.kind === "delete-path" ? [r.pattern] : []));
}
