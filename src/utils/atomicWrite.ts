/**
 * @file atomicWrite.ts
 * @description Whole-file writes that readers never observe half-done
 */

import { promises as fs } from "fs";
import path from "path";

/**
 * @function atomicWrite
 * @description Writes a temp file beside the target and renames it into place.
 * Creates missing parent directories.
 */
export async function atomicWrite(
  filePath: string,
  payload: string
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await fs.writeFile(tempPath, payload, { mode: 0o600 });
  await fs.rename(tempPath, filePath);
}
