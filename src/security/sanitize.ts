/**
 * Sanitize a path component so it cannot escape its parent directory.
 * @throws Error if the component is empty, `.`, or contains separators or traversal
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.trim() === "." ||
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Redact credentials from text that came from outside the process
 * (child-process output, error messages).
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;

  result = result.replace(/password\s*[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token\s*[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key\s*[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/secret\s*[=:]\s*\S+/gi, "secret=***");

  return result;
}
