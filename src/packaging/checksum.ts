import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA-256 of a file, streamed so large archives are not read into memory. */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
