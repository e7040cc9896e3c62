import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

export const DEFAULT_DIR_MODE = 0o755;
export const DEFAULT_FILE_MODE = 0o600;

/** Writes via a sibling temp file, fsync and rename, so readers never see a partial file. */
export async function writeFileAtomic(path: string, data: string, mode = DEFAULT_FILE_MODE): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true, mode: DEFAULT_DIR_MODE });
  const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);

  const handle = await open(tmpPath, "w", mode);
  try {
    await handle.writeFile(data, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/** Like writeFileAtomic, but first preserves the current contents at `<path>.bak`. */
export async function writeFileAtomicWithBackup(path: string, data: string, mode = DEFAULT_FILE_MODE): Promise<void> {
  let previous: string | null = null;
  try {
    previous = await readFile(path, "utf8");
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
  if (previous !== null) {
    await writeFileAtomic(`${path}.bak`, previous, mode);
  }
  await writeFileAtomic(path, data, mode);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
