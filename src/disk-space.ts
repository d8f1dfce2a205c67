import { stat, statfs } from 'fs/promises';
import { dirname, resolve } from 'path';
import { logger } from './logger.js';
import type { DiskSpaceProbe } from './types.js';

export const BYTES_PER_GB = 1024 ** 3;

/**
 * Closest ancestor of `path` that exists, so space can be checked before a course root is created
 */
export async function nearestExistingPath(path: string): Promise<string> {
  let current = resolve(path);
  for (;;) {
    try {
      await stat(current);
      return current;
    } catch {
      const parent = dirname(current);
      if (parent === current) return current;
      current = parent;
    }
  }
}

export class StatfsDiskSpaceProbe implements DiskSpaceProbe {
  async freeBytes(path: string): Promise<number> {
    const target = await nearestExistingPath(path);
    try {
      const stats = await statfs(target);
      return stats.bavail * stats.bsize;
    } catch (error) {
      logger.warn(`Could not read free space for ${target}`, { error: String(error) }, 'DiskSpace');
      return 0;
    }
  }
}
