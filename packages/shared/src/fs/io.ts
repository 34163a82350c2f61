import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a temporary file in the same directory and renames it into place,
 * so a reader never sees a half-written report.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
