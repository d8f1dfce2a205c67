import { join } from 'path';
import type { DriveIndex, IndexEntry } from '../types.js';

function parentPath(path: string): string {
  const slash = path.lastIndexOf('/');
  return slash === -1 ? '' : path.slice(0, slash);
}

function depth(path: string): number {
  return path.split('/').length;
}

/**
 * Read-only query view over a drive index
 */
export class IndexLookup {
  private readonly rootPaths = new Map<string, string>();
  private readonly rootOrder = new Map<string, number>();
  private readonly directoriesByName = new Map<string, IndexEntry[]>();
  private readonly childDirectories = new Map<string, IndexEntry[]>();

  constructor(index: DriveIndex) {
    index.roots.forEach((root, position) => {
      this.rootPaths.set(root.id, root.path);
      this.rootOrder.set(root.id, position);
    });

    for (const root of index.roots) {
      for (const entry of index.partitions[root.id] ?? []) {
        if (!entry.isDirectory) continue;

        const named = this.directoriesByName.get(entry.name) ?? [];
        named.push(entry);
        this.directoriesByName.set(entry.name, named);

        const key = this.childKey(entry.root, parentPath(entry.path));
        const siblings = this.childDirectories.get(key) ?? [];
        siblings.push(entry);
        this.childDirectories.set(key, siblings);
      }
    }

    for (const entries of this.directoriesByName.values()) {
      entries.sort((a, b) => depth(a.path) - depth(b.path) || this.order(a) - this.order(b));
    }
  }

  private childKey(root: string, path: string): string {
    return `${root}\u0000${path}`;
  }

  private order(entry: IndexEntry): number {
    return this.rootOrder.get(entry.root) ?? Number.MAX_SAFE_INTEGER;
  }

  directoryNames(): IterableIterator<string> {
    return this.directoriesByName.keys();
  }

  /**
   * Directories carrying exactly this name, shallowest first
   */
  directoriesNamed(name: string): IndexEntry[] {
    return this.directoriesByName.get(name) ?? [];
  }

  childDirectoriesOf(entry: IndexEntry): IndexEntry[] {
    return this.childDirectories.get(this.childKey(entry.root, entry.path)) ?? [];
  }

  absolutePath(entry: IndexEntry): string {
    const rootPath = this.rootPaths.get(entry.root);
    return rootPath === undefined ? entry.path : join(rootPath, entry.path);
  }
}
