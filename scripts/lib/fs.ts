import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes through a temp file in the same directory and renames it into place, so readers see
 * either the old file, the complete new one or nothing. The temp file is removed on failure and
 * on cancellation.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  signal?: AbortSignal
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmp = join(dir, `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);

  try {
    signal?.throwIfAborted();
    await writeFile(tmp, data, { signal });
    signal?.throwIfAborted();
    await rename(tmp, filePath);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
