/**
 * Local State Index
 *
 * In-memory record of the files and directories known below the synchronized
 * root. Keys are relative POSIX paths produced by `toIndexKey`; every method
 * is synchronous so each call is atomic on the event loop.
 */

import { PathError, type FileEntry, type Namespace } from '@tiersync/core';

/**
 * Normalize a relative "/"-separated path into an index key: no leading "./",
 * no edge slashes, no "." or ".." segments. Other characters, backslashes
 * included, are part of a name.
 */
export function toIndexKey(path: string): string {
  const segments = path.split('/').filter(s => s.length > 0 && s !== '.');

  if (segments.length === 0) {
    throw new PathError(path, 'relative path is empty');
  }
  if (segments.includes('..')) {
    throw new PathError(path, 'relative path escapes the synchronized root');
  }

  return segments.join('/');
}

function isBelow(key: string, dirKey: string): boolean {
  return key === dirKey || key.startsWith(`${dirKey}/`);
}

export class LocalStateIndex {
  private readonly files = new Map<string, FileEntry>();
  private readonly dirs = new Set<string>();

  /**
   * Record a fingerprint. The namespace defaults to the entry's current one,
   * or staging for a new entry.
   */
  setFile(path: string, fingerprint: string, namespace?: Namespace): void {
    const key = toIndexKey(path);
    const current = this.files.get(key);

    this.files.set(key, {
      fingerprint,
      namespace: namespace ?? current?.namespace ?? 'staging',
    });
  }

  removeFile(path: string): boolean {
    return this.files.delete(toIndexKey(path));
  }

  getFile(path: string): FileEntry | undefined {
    const entry = this.files.get(toIndexKey(path));
    return entry ? { ...entry } : undefined;
  }

  setDirKnown(path: string): void {
    this.dirs.add(toIndexKey(path));
  }

  hasDir(path: string): boolean {
    return this.dirs.has(toIndexKey(path));
  }

  /**
   * Forget a directory and every directory below it. Returns the removed keys.
   */
  removeDir(path: string): string[] {
    const key = toIndexKey(path);
    const removed = [...this.dirs].filter(dir => isBelow(dir, key));

    for (const dir of removed) {
      this.dirs.delete(dir);
    }
    return removed;
  }

  /**
   * Keys of the indexed files inside a directory, at any depth
   */
  filesBelow(path: string): string[] {
    const key = toIndexKey(path);
    return [...this.files.keys()].filter(file => file !== key && isBelow(file, key));
  }

  /**
   * Mark every file inside a promoted directory as living in production
   */
  promote(path: string): number {
    let count = 0;
    for (const file of this.filesBelow(path)) {
      const entry = this.files.get(file);
      if (entry) {
        this.files.set(file, { ...entry, namespace: 'production' });
        count++;
      }
    }
    return count;
  }

  filePaths(): string[] {
    return [...this.files.keys()];
  }

  dirPaths(): string[] {
    return [...this.dirs];
  }

  get fileCount(): number {
    return this.files.size;
  }

  get dirCount(): number {
    return this.dirs.size;
  }
}
