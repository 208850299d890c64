import type { Dirent } from 'node:fs';
import { readdir, rmdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

const LEFT_IN_PLACE = new Set(['ENOTEMPTY', 'EBUSY', 'EPERM', 'EACCES']);

/**
 * Removes the directories under `root` that hold no files, deepest first,
 * once their tracks have been filed or archived elsewhere. `root` and the
 * `keep` directories are never removed. Returns what was removed.
 */
export async function removeEmptyDirectories(root: string, keep: string[] = []): Promise<string[]> {
  const kept = new Set([root, ...keep].map((dir) => resolve(dir)));
  const removed: string[] = [];

  async function sweep(dir: string): Promise<boolean> {
    let entries: Dirent[];

    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }

      throw error;
    }

    let empty = true;

    for (const entry of entries) {
      if (!entry.isDirectory() || !(await sweep(join(dir, entry.name)))) {
        empty = false;
      }
    }

    if (!empty || kept.has(resolve(dir))) {
      return false;
    }

    try {
      await rmdir(dir);
    } catch (error) {
      if (LEFT_IN_PLACE.has((error as NodeJS.ErrnoException).code ?? '')) {
        return false;
      }

      throw error;
    }

    removed.push(dir);
    return true;
  }

  await sweep(root);

  return removed;
}
