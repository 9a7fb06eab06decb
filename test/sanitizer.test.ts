import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { buildRules, credentialPattern, deletePatterns, matchesExcluded } from "../src/packaging/rules.js";
import { applyRewrite, ensureOsImport, findUnsafeAssignments, type RewriteRule } from "../src/packaging/rewriter.js";
import { findExcluded, sanitizeTree } from "../src/packaging/sanitizer.js";
import { testConfig, writeTree } from "./helpers/fixtures.js";

const EXCLUDE = testConfig().packaging.exclude;

function rewriteRule(): RewriteRule {
  const rule = buildRules(testConfig().packaging).find((r): r is RewriteRule => r.kind === "rewrite-pattern");
  if (!rule) throw new Error("no rewrite rule");
  return rule;
}

describe("sanitization rules", () => {
  it("lists delete rules in configured order before the credential rewrite", () => {
    const rules = buildRules(testConfig().packaging);
    expect(rules.map((r) => r.kind)).toEqual(["delete-path", "delete-path", "delete-path", "delete-path", "delete-path", "rewrite-pattern"]);
    expect(deletePatterns(rules)).toEqual([...EXCLUDE]);
  });

  it("matches excluded paths at the configured depth", () => {
    expect(matchesExcluded("cache_dmr_pro", EXCLUDE)).toBe(true);
    expect(matchesExcluded("reports/cache_dmr_pro", EXCLUDE)).toBe(false);
    expect(matchesExcluded("__pycache__", EXCLUDE)).toBe(true);
    expect(matchesExcluded("a/b/__pycache__", EXCLUDE)).toBe(true);
    expect(matchesExcluded(".env", EXCLUDE)).toBe(true);
    expect(matchesExcluded("deploy/.env", EXCLUDE)).toBe(true);
    expect(matchesExcluded("config.py", EXCLUDE)).toBe(false);
  });

  it("matches case-sensitively", () => {
    expect(matchesExcluded(".ENV", EXCLUDE)).toBe(false);
    expect(matchesExcluded("Subscribers.json", EXCLUDE)).toBe(false);
    expect(matchesExcluded("Cache_DMR_Pro", EXCLUDE)).toBe(false);
  });

  it("only matches the configured variable with a quoted literal", () => {
    const pattern = credentialPattern("TOKEN");
    expect('TOKEN = "abc"'.match(pattern)).toHaveLength(1);
    expect("TOKEN='abc'".match(pattern)).toHaveLength(1);
    expect('token = "abc"'.match(pattern)).toBeNull();
    expect('TOKEN_BACKUP = "abc"'.match(pattern)).toBeNull();
    expect('TOKEN = os.environ.get("TUSHARE_TOKEN", "")'.match(pattern)).toBeNull();
    expect('# TOKEN = "abc"'.match(pattern)).toBeNull();
  });
});

describe("tree sanitizer", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "dashctl-sanitize-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("removes matches whole without descending into them", () => {
    writeTree(root, {
      "cache_dmr_pro/__pycache__/x.pyc": "",
      "cache_dmr_pro/data.pkl": "",
      "pages/__pycache__/p.pyc": "",
      "pages/overview.py": "",
      "subscribers.json": "[]",
    });

    const removed = sanitizeTree(root, EXCLUDE);

    expect(removed).toEqual(["cache_dmr_pro", "pages/__pycache__", "subscribers.json"]);
    expect(fs.existsSync(path.join(root, "pages", "overview.py"))).toBe(true);
    expect(findExcluded(root, EXCLUDE)).toEqual([]);
  });

  it("is a no-op when nothing matches", () => {
    writeTree(root, { "app_dashboard.py": "" });
    expect(sanitizeTree(root, EXCLUDE)).toEqual([]);
  });

  it("finds excluded paths that are still present", () => {
    writeTree(root, { "deploy/.env": "", "app_dashboard.py": "" });
    expect(findExcluded(root, EXCLUDE)).toEqual(["deploy/.env"]);
  });
});

describe("credential rewrite", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "dashctl-rewrite-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("replaces the literal and adds the os import", () => {
    writeTree(root, { "config.py": 'TOKEN = "abc123"\nPORT = 8501\n' });

    expect(applyRewrite(root, rewriteRule())).toEqual({ status: "rewritten", file: "config.py", count: 1 });
    expect(fs.readFileSync(path.join(root, "config.py"), "utf8")).toBe(
      'import os\nTOKEN = os.environ.get("TUSHARE_TOKEN", "")\nPORT = 8501\n',
    );
  });

  it("keeps indentation and rewrites every literal assignment", () => {
    writeTree(root, {
      "config.py": "import os\nif os.name == 'nt':\n    TOKEN = 'win-placeholder'\nelse:\n    TOKEN = \"posix-placeholder\"\n",
    });

    expect(applyRewrite(root, rewriteRule())).toEqual({ status: "rewritten", file: "config.py", count: 2 });
    expect(fs.readFileSync(path.join(root, "config.py"), "utf8")).toBe(
      "import os\nif os.name == 'nt':\n" +
        '    TOKEN = os.environ.get("TUSHARE_TOKEN", "")\nelse:\n' +
        '    TOKEN = os.environ.get("TUSHARE_TOKEN", "")\n',
    );
  });

  it.each([
    ["an escaped quote", 'TOKEN = "ab\\"c123"\n'],
    ["a triple-quoted literal", 'TOKEN = """abc123"""\n'],
    ["a triple-quoted literal over several lines", "TOKEN = '''abc\n123'''\n"],
    ["a raw-string prefix", 'TOKEN = r"abc123"\n'],
    ["a parenthesised literal", 'TOKEN = ( "abc123" )\n'],
  ])("replaces the whole literal for %s", (_label, text) => {
    writeTree(root, { "config.py": text });

    expect(applyRewrite(root, rewriteRule())).toEqual({ status: "rewritten", file: "config.py", count: 1 });
    expect(fs.readFileSync(path.join(root, "config.py"), "utf8")).toBe('import os\nTOKEN = os.environ.get("TUSHARE_TOKEN", "")\n');
  });

  it("keeps a type annotation", () => {
    writeTree(root, { "config.py": 'TOKEN: str = "abc123"\n' });

    applyRewrite(root, rewriteRule());
    expect(fs.readFileSync(path.join(root, "config.py"), "utf8")).toBe('import os\nTOKEN: str = os.environ.get("TUSHARE_TOKEN", "")\n');
  });

  it("skips a missing file", () => {
    expect(applyRewrite(root, rewriteRule())).toEqual({ status: "skipped", file: "config.py" });
  });

  it("leaves a file without a literal untouched", () => {
    const text = "from os import environ\nTOKEN = environ['TUSHARE_TOKEN']\n";
    writeTree(root, { "config.py": text });

    expect(applyRewrite(root, rewriteRule())).toEqual({ status: "unchanged", file: "config.py" });
    expect(fs.readFileSync(path.join(root, "config.py"), "utf8")).toBe(text);
  });
});

describe("unsafe credential assignments", () => {
  it("lists every line that assigns something other than the environment lookup", () => {
    const text = [
      'TOKEN = os.environ.get("TUSHARE_TOKEN", "")  # set in the shell',
      "TOKEN = get_token()",
      "if TOKEN == 'x':",
      '    TOKEN = os.environ.get("TUSHARE_TOKEN", "") + SUFFIX',
      "TOKEN_BACKUP = 'kept'",
      "TOKEN: str = environ['TUSHARE_TOKEN']\r",
      "",
    ].join("\n");

    expect(findUnsafeAssignments(text, rewriteRule())).toEqual([2, 4, 6]);
  });

  it("is empty once every literal has been rewritten", () => {
    const rule = rewriteRule();
    const rewritten = 'TOKEN = "abc"\n    TOKEN: str = """x"""\n'.replace(rule.pattern, rule.replacement);
    expect(findUnsafeAssignments(rewritten, rule)).toEqual([]);
  });

  it("catches what the literal rewrite leaves behind", () => {
    const rule = rewriteRule();
    const rewritten = 'TOKEN = "abc" "def"\n'.replace(rule.pattern, rule.replacement);
    expect(rewritten).toBe('TOKEN = os.environ.get("TUSHARE_TOKEN", "") "def"\n');
    expect(findUnsafeAssignments(rewritten, rule)).toEqual([1]);
  });
});

describe("os import", () => {
  it("goes after the shebang and encoding lines", () => {
    expect(ensureOsImport("#!/usr/bin/env python\n# -*- coding: utf-8 -*-\nTOKEN = 1\n")).toBe(
      "#!/usr/bin/env python\n# -*- coding: utf-8 -*-\nimport os\nTOKEN = 1\n",
    );
  });

  it("goes after future imports", () => {
    expect(ensureOsImport("from __future__ import annotations\nX = 1\n")).toBe(
      "from __future__ import annotations\nimport os\nX = 1\n",
    );
  });

  it("is not added twice", () => {
    expect(ensureOsImport("import os\nX = 1\n")).toBe("import os\nX = 1\n");
    expect(ensureOsImport("import sys, os\n")).toBe("import sys, os\n");
    expect(ensureOsImport("import os.path\n")).toBe("import os.path\n");
  });

  it("is added when os is only imported inside a function", () => {
    expect(ensureOsImport("def f():\n    import os\nTOKEN = 1\n")).toBe("import os\ndef f():\n    import os\nTOKEN = 1\n");
  });

  it("is added when os is only imported from", () => {
    expect(ensureOsImport("from os import environ\n")).toBe("import os\nfrom os import environ\n");
    expect(ensureOsImport("import osmnx\n")).toBe("import os\nimport osmnx\n");
  });
});
