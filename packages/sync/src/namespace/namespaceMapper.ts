/**
 * Namespace Mapper
 * 
 * Maps paths between the local synchronized root and the remote namespaces.
 * 
 *   <root>/sub/b.txt  <->  sub/b.txt  <->  <staging>/sub/b.txt
 *                                      <->  <production>/sub/b.txt
 * 
 * Every local path goes through `toRelative` before it touches the index or
 * the remote store, so all keys share one convention.
 */

import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { PathError, type Namespace } from '@tiersync/core';
import {
  isBelowRemotePath,
  joinRemotePath,
  normalizeRemotePath,
  rebaseRemotePath,
} from '@tiersync/renter';
import { toIndexKey } from '../state/localStateIndex.js';

export interface NamespaceMapperConfig {
  // Local directory being synchronized
  root: string;

  // Remote prefix for fresh uploads
  stagingPrefix: string;

  // Remote prefix for replication-verified directories
  productionPrefix: string;
}

export interface RemoteLocation {
  namespace: Namespace;
  relativePath: string;
}

export class NamespaceMapper {
  readonly root: string;
  readonly stagingPrefix: string;
  readonly productionPrefix: string;

  constructor(config: NamespaceMapperConfig) {
    this.root = resolve(config.root);
    this.stagingPrefix = normalizeRemotePath(config.stagingPrefix);
    this.productionPrefix = normalizeRemotePath(config.productionPrefix);

    if (
      isBelowRemotePath(this.stagingPrefix, this.productionPrefix) ||
      isBelowRemotePath(this.productionPrefix, this.stagingPrefix)
    ) {
      throw new PathError(
        this.stagingPrefix,
        `staging and production prefixes must be distinct and not nested (production: ${this.productionPrefix})`
      );
    }
  }

  /**
   * Index key for a local path, absolute or relative to the root
   */
  toRelative(localPath: string): string {
    const absolute = isAbsolute(localPath) ? resolve(localPath) : resolve(this.root, localPath);
    const rel = relative(this.root, absolute);

    if (rel === '') {
      throw new PathError(localPath, 'is the synchronized root itself');
    }
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new PathError(localPath, `outside of ${this.root}`);
    }

    return toIndexKey(rel.split(sep).join('/'));
  }

  toAbsolute(relativePath: string): string {
    return join(this.root, ...toIndexKey(relativePath).split('/'));
  }

  prefix(namespace: Namespace): string {
    return namespace === 'staging' ? this.stagingPrefix : this.productionPrefix;
  }

  toRemote(relativePath: string, namespace: Namespace = 'staging'): string {
    return joinRemotePath(this.prefix(namespace), toIndexKey(relativePath));
  }

  /**
   * Reverse mapping; null for paths outside both namespaces
   */
  fromRemote(remotePath: string): RemoteLocation | null {
    const path = normalizeRemotePath(remotePath);

    for (const namespace of ['staging', 'production'] as const) {
      const prefix = this.prefix(namespace);
      if (path !== prefix && isBelowRemotePath(path, prefix)) {
        return { namespace, relativePath: path.slice(prefix.length + 1) };
      }
    }
    return null;
  }

  /**
   * Production path a staging directory is renamed to on promotion
   */
  promotionTarget(stagingPath: string): string {
    return rebaseRemotePath(stagingPath, this.stagingPrefix, this.productionPrefix);
  }
}
