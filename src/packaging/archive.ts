import fs from "node:fs";
import path from "node:path";
import archiver from "archiver";
import * as tar from "tar";
import type { ArchiveFormat } from "../types/config.js";

/**
 * Compress `stagedDir` into `destFile`. The archive holds a single top-level
 * directory named after `stagedDir`'s basename.
 */
export type ArchiveWriter = (stagedDir: string, destFile: string) => Promise<void>;

export const ARCHIVE_EXTENSIONS: Record<ArchiveFormat, string> = {
  zip: ".zip",
  "tar.gz": ".tar.gz",
};

export const writeZip: ArchiveWriter = (stagedDir, destFile) =>
  new Promise((resolve, reject) => {
    const output = fs.createWriteStream(destFile);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    // A file vanishing mid-walk would silently drop it from the archive.
    archive.on("warning", reject);

    archive.pipe(output);
    archive.directory(stagedDir, path.basename(stagedDir));
    archive.finalize().catch(reject);
  });

export const writeTarGz: ArchiveWriter = async (stagedDir, destFile) => {
  await tar.c({ gzip: true, portable: true, file: destFile, cwd: path.dirname(stagedDir) }, [path.basename(stagedDir)]);
};

export const DEFAULT_WRITERS: Record<ArchiveFormat, ArchiveWriter> = {
  zip: writeZip,
  "tar.gz": writeTarGz,
};
