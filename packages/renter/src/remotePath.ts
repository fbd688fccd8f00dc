/**
 * Remote Path Helpers
 *
 * Remote paths are slash separated, never start or end with a slash and have
 * no empty, "." or ".." segment.
 */

import { PathError } from '@tiersync/core';

/**
 * Validate and normalize a remote path, collapsing repeated and edge slashes
 */
export function normalizeRemotePath(path: string): string {
  const segments = path.split('/').filter(s => s.length > 0);

  if (segments.length === 0) {
    throw new PathError(path, 'remote path is empty');
  }
  for (const segment of segments) {
    if (segment === '.' || segment === '..') {
      throw new PathError(path, `remote path may not contain "${segment}"`);
    }
  }

  return segments.join('/');
}

export function joinRemotePath(...parts: string[]): string {
  return normalizeRemotePath(parts.filter(p => p.length > 0).join('/'));
}

/**
 * True when `path` equals `parent` or lies below it
 */
export function isBelowRemotePath(path: string, parent: string): boolean {
  return path === parent || path.startsWith(`${parent}/`);
}

/**
 * Move a path from one prefix to another, keeping the suffix unchanged
 */
export function rebaseRemotePath(path: string, from: string, to: string): string {
  const source = normalizeRemotePath(path);
  const oldBase = normalizeRemotePath(from);
  const newBase = normalizeRemotePath(to);

  if (!isBelowRemotePath(source, oldBase)) {
    throw new PathError(path, `not below ${oldBase}`);
  }

  const suffix = source.slice(oldBase.length);
  return `${newBase}${suffix}`;
}

/**
 * Encode a remote path for use in a URL, segment by segment
 */
export function encodeRemotePath(path: string): string {
  return normalizeRemotePath(path).split('/').map(encodeURIComponent).join('/');
}
