import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { inflateRawSync } from "node:zlib";
import type { Diagnostic, Reporter } from "../../src/output/reporter.js";
import type { DashctlConfig } from "../../src/types/config.js";

export const REPO_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export function memoryReporter(): { reporter: Reporter; events: Diagnostic[]; codes: () => string[] } {
  const events: Diagnostic[] = [];
  return {
    reporter: { emit: (d) => events.push(d) },
    events,
    codes: () => events.map((e) => e.code),
  };
}

export function testConfig(): DashctlConfig {
  return {
    schema_version: "1.0.0",
    app_dir: ".",
    runtime: {
      name: "Python",
      commands: ["python3", "python"],
      version_args: ["--version"],
      min_version: "3.8",
      install_hints: {
        linux: "sudo apt install python3",
        darwin: "brew install python",
        default: "See python.org",
      },
    },
    dependencies: {
      manifest: "requirements.txt",
      sentinel: "streamlit",
      install_args: ["-m", "pip", "install", "--disable-pip-version-check", "-q", "-r"],
    },
    launch: {
      entrypoint: "app_dashboard.py",
      port: 8501,
      headless: false,
      open_browser: false,
      browser_delay_ms: 0,
    },
    packaging: {
      output_dir: "dist",
      staging_root: ".dashctl-staging",
      format: "zip",
      exclude: ["cache_dmr_pro", "**/__pycache__", "**/.DS_Store", "**/subscribers.json", "**/.env"],
      credential: { file: "config.py", variable: "TOKEN", env_var: "TUSHARE_TOKEN" },
    },
  };
}

/** Write `files` (relative path → content) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content, "utf8");
  }
}

type ZipRecord = { name: string; method: number; compressedSize: number; localOffset: number };

function readCentralDirectory(buf: Buffer, file: string): ZipRecord[] {
  const eocd = buf.lastIndexOf(Buffer.from([0x50, 0x4b, 0x05, 0x06]));
  if (eocd < 0) throw new Error(`not a zip: ${file}`);

  const count = buf.readUInt16LE(eocd + 10);
  let offset = buf.readUInt32LE(eocd + 16);
  const records: ZipRecord[] = [];
  for (let i = 0; i < count; i++) {
    if (buf.readUInt32LE(offset) !== 0x02014b50) throw new Error(`bad central directory entry at ${offset}`);
    const nameLen = buf.readUInt16LE(offset + 28);
    const extraLen = buf.readUInt16LE(offset + 30);
    const commentLen = buf.readUInt16LE(offset + 32);
    records.push({
      name: buf.toString("utf8", offset + 46, offset + 46 + nameLen),
      method: buf.readUInt16LE(offset + 10),
      compressedSize: buf.readUInt32LE(offset + 20),
      localOffset: buf.readUInt32LE(offset + 42),
    });
    offset += 46 + nameLen + extraLen + commentLen;
  }
  return records;
}

/** Entry names from a zip's central directory. */
export function zipEntryNames(file: string): string[] {
  return readCentralDirectory(fs.readFileSync(file), file).map((r) => r.name);
}

/** File entries of a zip (directories left out), decompressed. Stored and deflated entries only. */
export function zipEntries(file: string): Map<string, Buffer> {
  const buf = fs.readFileSync(file);
  const entries = new Map<string, Buffer>();
  for (const record of readCentralDirectory(buf, file)) {
    if (record.name.endsWith("/")) continue;
    const local = record.localOffset;
    if (buf.readUInt32LE(local) !== 0x04034b50) throw new Error(`bad local header for ${record.name}`);
    const start = local + 30 + buf.readUInt16LE(local + 26) + buf.readUInt16LE(local + 28);
    const data = buf.subarray(start, start + record.compressedSize);
    if (record.method === 0) entries.set(record.name, Buffer.from(data));
    else if (record.method === 8) entries.set(record.name, inflateRawSync(data));
    else throw new Error(`unsupported compression method ${record.method} for ${record.name}`);
  }
  return entries;
}
