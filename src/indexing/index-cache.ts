/**
 * Persistent cache for drive indexes, keyed by the fingerprint of the root set
 */

import { createHash } from 'crypto';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync, renameSync } from 'fs';
import { join, resolve } from 'path';
import { logger } from '../logger.js';
import type { Clock, DriveIndex, IndexEntry, StorageRoot } from '../types.js';

export type CacheMissReason = 'absent' | 'unreadable' | 'stale' | 'fingerprint-mismatch' | 'forced';

export interface CacheLookup {
  index: DriveIndex | null;
  reason: CacheMissReason | null;
  ageHours: number | null;
}

export interface IndexCacheOptions {
  cacheDir: string;
  maxAgeHours: number;
  clock?: Clock;
}

const HOUR_MS = 60 * 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIndexEntry(value: unknown): value is IndexEntry {
  return (
    isRecord(value) &&
    typeof value.root === 'string' &&
    typeof value.path === 'string' &&
    typeof value.name === 'string' &&
    typeof value.normalizedName === 'string' &&
    typeof value.isDirectory === 'boolean'
  );
}

function isStorageRoot(value: unknown): value is StorageRoot {
  return isRecord(value) && typeof value.id === 'string' && typeof value.path === 'string';
}

function parseDriveIndex(value: unknown): DriveIndex | null {
  if (!isRecord(value)) return null;
  const { fingerprint, createdAt, roots, partitions, warnings } = value;
  if (typeof fingerprint !== 'string' || typeof createdAt !== 'string') return null;
  if (!Array.isArray(roots) || !roots.every(isStorageRoot)) return null;
  if (!Array.isArray(warnings) || !warnings.every(warning => typeof warning === 'string')) return null;
  if (!isRecord(partitions)) return null;

  const parsedPartitions: Record<string, IndexEntry[]> = {};
  for (const [rootId, entries] of Object.entries(partitions)) {
    if (!Array.isArray(entries) || !entries.every(isIndexEntry)) return null;
    parsedPartitions[rootId] = entries;
  }

  return { fingerprint, createdAt, roots, partitions: parsedPartitions, warnings };
}

/**
 * Stable identity of a set of roots, independent of order
 */
export function fingerprintRoots(roots: StorageRoot[]): string {
  const normalized = roots
    .map(root => `${root.id}=${resolve(root.path)}`)
    .sort()
    .join('\n');
  return createHash('sha256').update(normalized).digest('hex').substring(0, 16);
}

export class IndexCache {
  private readonly cacheDir: string;
  private readonly maxAgeHours: number;
  private readonly clock: Clock;

  constructor(options: IndexCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.maxAgeHours = options.maxAgeHours;
    this.clock = options.clock ?? (() => new Date());
  }

  now(): Date {
    return this.clock();
  }

  pathFor(fingerprint: string): string {
    return join(this.cacheDir, `drive-index-${fingerprint}.json`);
  }

  ageHours(index: DriveIndex): number {
    const created = Date.parse(index.createdAt);
    if (Number.isNaN(created)) return Number.POSITIVE_INFINITY;
    return (this.clock().getTime() - created) / HOUR_MS;
  }

  /**
   * Cached index for the fingerprint, or the reason it must be rebuilt
   */
  lookup(fingerprint: string, forceRefresh = false): CacheLookup {
    if (forceRefresh) {
      return { index: null, reason: 'forced', ageHours: null };
    }

    const cachePath = this.pathFor(fingerprint);
    if (!existsSync(cachePath)) {
      return { index: null, reason: 'absent', ageHours: null };
    }

    let index: DriveIndex | null;
    try {
      index = parseDriveIndex(JSON.parse(readFileSync(cachePath, 'utf-8')));
    } catch (error) {
      logger.warn(
        `Index cache unreadable, rescanning: ${error instanceof Error ? error.message : String(error)}`,
        { cachePath },
        'IndexCache'
      );
      return { index: null, reason: 'unreadable', ageHours: null };
    }

    if (!index) {
      return { index: null, reason: 'unreadable', ageHours: null };
    }
    if (index.fingerprint !== fingerprint) {
      return { index: null, reason: 'fingerprint-mismatch', ageHours: null };
    }

    const ageHours = this.ageHours(index);
    if (ageHours > this.maxAgeHours) {
      return { index: null, reason: 'stale', ageHours };
    }

    return { index, reason: null, ageHours };
  }

  save(index: DriveIndex): string {
    mkdirSync(this.cacheDir, { recursive: true });
    const cachePath = this.pathFor(index.fingerprint);
    const tempPath = `${cachePath}.tmp`;
    writeFileSync(tempPath, JSON.stringify(index));
    renameSync(tempPath, cachePath);
    logger.debug('Index cached', { cachePath }, 'IndexCache');
    return cachePath;
  }

  invalidate(fingerprint: string): void {
    rmSync(this.pathFor(fingerprint), { force: true });
    logger.info('Index cache invalidated', { fingerprint }, 'IndexCache');
  }
}
