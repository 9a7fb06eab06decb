import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { ProcessRunner, formatCommand } from "../src/exec/runner.js";

const node = process.execPath;

describe("process runner", () => {
  const runner = new ProcessRunner();
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "dashctl-runner-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("captures output and the exit code", async () => {
    expect(await runner.run(node, ["-e", "process.stdout.write('Python 3.11.4')"], { stdio: "capture" })).toEqual({
      kind: "exited",
      code: 0,
      output: "Python 3.11.4",
    });
    expect(await runner.run(node, ["-e", "process.exit(3)"], { stdio: "capture" })).toEqual({
      kind: "exited",
      code: 3,
      output: "",
    });
  });

  it("runs in the requested directory", async () => {
    const status = await runner.run(node, ["-e", "process.stdout.write(process.cwd())"], { stdio: "capture", cwd: tmpDir });
    expect(status).toEqual({ kind: "exited", code: 0, output: fs.realpathSync(tmpDir) });
  });

  it("reports a missing executable as not found", async () => {
    expect(await runner.run("dashctl-missing-executable", ["--version"], { stdio: "capture" })).toEqual({ kind: "not_found" });
  });

  it.skipIf(process.platform === "win32")("reports a child killed by a signal", async () => {
    const status = await runner.run(node, ["-e", "process.kill(process.pid, 'SIGTERM')"], { stdio: "capture" });
    expect(status).toEqual({ kind: "signaled", signal: "SIGTERM" });
  });
});

describe("formatCommand", () => {
  it("quotes arguments with spaces", () => {
    expect(formatCommand("python3", ["-c", "import streamlit"])).toBe('python3 -c "import streamlit"');
    expect(formatCommand("python3", ["-m", "pip", "install", "-r", "requirements.txt"])).toBe(
      "python3 -m pip install -r requirements.txt",
    );
  });
});
