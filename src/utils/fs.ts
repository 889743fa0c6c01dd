import { mkdir, rename, rm, writeFile } from "fs/promises";
import * as path from "path";
import * as crypto from "crypto";

/** Writes through a sibling temp file and a rename, so readers never see a partial file. */
export async function writeFileAtomic(
  filePath: string,
  content: string | Uint8Array,
  options: { encoding?: BufferEncoding; mode?: number } = {}
): Promise<void> {
  const { encoding = "utf-8", mode } = options;
  const dir = path.dirname(filePath);
  const hash = crypto.randomBytes(8).toString("hex");
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${hash}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, content, {
      ...(typeof content === "string" ? { encoding } : {}),
      ...(mode !== undefined ? { mode } : {})
    });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
