/**
 * Storage indexer - recursively inventories every mounted root
 */

import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { extname, join } from 'path';
import pLimit from 'p-limit';
import { AppError, errorMessage, logger } from '../logger.js';
import { normalizeName } from '../naming.js';
import type { DriveIndex, IndexEntry, StorageRoot } from '../types.js';
import { IndexCache, fingerprintRoots } from './index-cache.js';

const SKIP_DIRECTORIES = new Set([
  'System Volume Information',
  '$RECYCLE.BIN',
  '$Recycle.Bin',
  'lost+found',
  'proc',
  'sys',
  'dev',
]);

export interface RootScan {
  root: StorageRoot;
  entries: IndexEntry[];
  warnings: string[];
}

export interface StorageIndexerOptions {
  maxWorkers?: number;
  /** File extensions to record; directories are always recorded */
  extensionsFilter?: string[];
}

function normalizeExtensions(extensions: string[]): Set<string> {
  return new Set(extensions.map(ext => ext.toLowerCase().replace(/^\./, '')).filter(Boolean));
}

export class StorageIndexer {
  private readonly maxWorkers: number;
  private readonly extensions: Set<string>;

  constructor(private readonly cache: IndexCache, options: StorageIndexerOptions = {}) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? 4);
    this.extensions = normalizeExtensions(options.extensionsFilter ?? []);
  }

  async buildOrLoadIndex(
    roots: StorageRoot[],
    forceRefresh = false,
    signal?: AbortSignal
  ): Promise<DriveIndex> {
    const fingerprint = fingerprintRoots(roots);
    const cached = this.cache.lookup(fingerprint, forceRefresh);

    if (cached.index) {
      logger.info(
        `Using cached index (${(cached.ageHours ?? 0).toFixed(1)}h old)`,
        { fingerprint, roots: roots.length },
        'StorageIndexer'
      );
      return cached.index;
    }

    logger.info(`Rebuilding index (${cached.reason})`, { fingerprint, roots: roots.length }, 'StorageIndexer');

    const limit = pLimit(Math.min(this.maxWorkers, Math.max(roots.length, 1)));
    const scans = await Promise.all(
      roots.map(root =>
        limit(() => {
          if (signal?.aborted) {
            throw new AppError('Indexing cancelled', 'INDEX_CANCELLED', 499, { root: root.id });
          }
          return this.scanRoot(root);
        })
      )
    );

    if (signal?.aborted) {
      throw new AppError('Indexing cancelled', 'INDEX_CANCELLED', 499);
    }

    const index: DriveIndex = {
      fingerprint,
      createdAt: this.cache.now().toISOString(),
      roots: roots.map(root => ({ ...root })),
      partitions: Object.fromEntries(scans.map(scan => [scan.root.id, scan.entries])),
      warnings: scans.flatMap(scan => scan.warnings),
    };

    try {
      this.cache.save(index);
    } catch (error) {
      logger.warn(`Could not write index cache: ${errorMessage(error)}`, undefined, 'StorageIndexer');
    }

    return index;
  }

  /**
   * Walk one root; unreadable directories are skipped and reported
   */
  async scanRoot(root: StorageRoot): Promise<RootScan> {
    const entries: IndexEntry[] = [];
    const warnings: string[] = [];

    try {
      const rootStat = await stat(root.path);
      if (!rootStat.isDirectory()) {
        warnings.push(`Root ${root.id} is not a directory: ${root.path}`);
        return { root, entries, warnings };
      }
    } catch (error) {
      warnings.push(`Root ${root.id} is not accessible (${root.path}): ${errorMessage(error)}`);
      logger.warn(`Root not accessible: ${root.path}`, { root: root.id }, 'StorageIndexer');
      return { root, entries, warnings };
    }

    const stack: string[] = [''];
    while (stack.length > 0) {
      const relativeDirectory = stack.pop() ?? '';
      const absoluteDirectory = relativeDirectory ? join(root.path, relativeDirectory) : root.path;

      let dirents: Dirent[];
      try {
        dirents = await readdir(absoluteDirectory, { withFileTypes: true });
      } catch (error) {
        warnings.push(`Skipped unreadable directory ${absoluteDirectory}: ${errorMessage(error)}`);
        continue;
      }

      for (const dirent of dirents) {
        if (dirent.name.startsWith('.')) continue;
        const relativePath = relativeDirectory ? `${relativeDirectory}/${dirent.name}` : dirent.name;

        if (dirent.isDirectory()) {
          if (SKIP_DIRECTORIES.has(dirent.name)) continue;
          entries.push(this.toEntry(root, relativePath, dirent.name, true));
          stack.push(relativePath);
          continue;
        }

        if (!dirent.isFile()) continue;
        if (this.extensions.size > 0) {
          const extension = extname(dirent.name).toLowerCase().replace(/^\./, '');
          if (!this.extensions.has(extension)) continue;
        }
        entries.push(this.toEntry(root, relativePath, dirent.name, false));
      }
    }

    entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    logger.info(`Root ${root.id}: ${entries.length} paths`, { warnings: warnings.length }, 'StorageIndexer');
    return { root, entries, warnings };
  }

  private toEntry(root: StorageRoot, path: string, name: string, isDirectory: boolean): IndexEntry {
    return {
      root: root.id,
      path,
      name,
      normalizedName: normalizeName(name),
      isDirectory,
    };
  }
}

/**
 * One-shot helper: cache in `cacheDir`, rebuilt after `maxAgeHours`
 */
export async function buildOrLoadIndex(
  roots: StorageRoot[],
  maxAgeHours: number,
  forceRefresh: boolean,
  options: StorageIndexerOptions & { cacheDir: string; signal?: AbortSignal }
): Promise<DriveIndex> {
  const cache = new IndexCache({ cacheDir: options.cacheDir, maxAgeHours });
  const indexer = new StorageIndexer(cache, options);
  return indexer.buildOrLoadIndex(roots, forceRefresh, options.signal);
}
