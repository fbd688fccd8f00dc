/**
 * Reconciliation Engine
 * 
 * Rebuilds the local state index at startup and brings the staging namespace
 * in line with the local tree:
 * 
 * 1. walk              - register directories, fingerprint files
 * 2. uploadNonExisting - upload files the remote side has never seen
 * 3. uploadChanged     - replace staging objects whose content differs
 * 
 * Every failure rejects; startup does not continue on a partial view.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { IOError, type RemoteStore } from '@tiersync/core';
import { createLogger, formatDuration, type Logger } from '@tiersync/utils';
import type { LocalStateIndex } from '../state/localStateIndex.js';
import type { ChecksumProvider } from '../state/checksum.js';
import type { NamespaceMapper } from '../namespace/namespaceMapper.js';
import type { IgnoreRules } from '../watcher/ignore.js';
import type { DirectoryWatcher } from '../watcher/types.js';
import type { FileOperations } from './fileOperations.js';

export interface ReconcilerConfig {
  index: LocalStateIndex;
  store: RemoteStore;
  mapper: NamespaceMapper;
  checksum: ChecksumProvider;
  operations: FileOperations;
  watcher: DirectoryWatcher;
  ignore: IgnoreRules;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface ReconcileResult {
  files: number;
  directories: number;
  uploaded: number;
  reuploaded: number;
  durationMs: number;
}

export class Reconciler {
  private readonly config: ReconcilerConfig;
  private readonly logger: Logger;

  constructor(config: ReconcilerConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger({ component: 'reconciler' });
  }

  async reconcile(): Promise<ReconcileResult> {
    const startedAt = Date.now();
    const { index } = this.config;

    await this.walk();
    const uploaded = await this.uploadNonExisting();
    const reuploaded = await this.uploadChanged();

    const result: ReconcileResult = {
      files: index.fileCount,
      directories: index.dirCount,
      uploaded,
      reuploaded,
      durationMs: Date.now() - startedAt,
    };

    this.logger.info(
      { ...result, duration: formatDuration(result.durationMs) },
      'Reconciliation complete'
    );
    return result;
  }

  /**
   * Seed the index from the local tree and arm the watcher on every directory
   */
  async walk(): Promise<void> {
    const { mapper, watcher } = this.config;

    watcher.addPath(mapper.root);
    await this.walkDirectory(mapper.root);

    this.logger.debug(
      { files: this.config.index.fileCount, directories: this.config.index.dirCount },
      'Local walk complete'
    );
  }

  /**
   * Upload indexed files found in neither namespace. Returns the upload count.
   */
  async uploadNonExisting(): Promise<number> {
    const { index, store, mapper, operations, signal } = this.config;
    const remote = await store.listFiles([mapper.stagingPrefix, mapper.productionPrefix], { signal });

    const staging = new Set<string>();
    const production = new Set<string>();
    for (const file of remote) {
      const location = mapper.fromRemote(file.remotePath);
      if (location) {
        (location.namespace === 'staging' ? staging : production).add(location.relativePath);
      }
    }

    let uploaded = 0;
    for (const path of index.filePaths()) {
      if (staging.has(path)) {
        continue;
      }

      const entry = index.getFile(path);
      if (production.has(path)) {
        if (entry) {
          index.setFile(path, entry.fingerprint, 'production');
        }
        continue;
      }

      await operations.handleCreate(path);
      uploaded++;
    }

    return uploaded;
  }

  /**
   * Compare staging objects against local content and replace the ones that
   * differ. Returns the number of replaced objects.
   */
  async uploadChanged(): Promise<number> {
    const { index, store, mapper, checksum, operations, signal } = this.config;
    const remote = await store.listFiles([mapper.stagingPrefix], { signal });

    let reuploaded = 0;
    for (const file of remote) {
      const location = mapper.fromRemote(file.remotePath);
      if (!location || location.namespace !== 'staging') {
        continue;
      }

      const entry = index.getFile(location.relativePath);
      if (!entry || entry.namespace !== 'staging') {
        continue;
      }

      const baseline = await checksum.baselineFromRemote(
        mapper.toAbsolute(location.relativePath),
        file.size
      );
      index.setFile(location.relativePath, baseline);

      if (await operations.handleWrite(location.relativePath) === 'reuploaded') {
        reuploaded++;
      }
    }

    return reuploaded;
  }

  private async walkDirectory(dirPath: string): Promise<void> {
    const { index, mapper, checksum, watcher, ignore } = this.config;

    let entries: Dirent[];
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      throw new IOError(dirPath, 'read directory', error);
    }

    for (const entry of entries) {
      const fullPath = join(dirPath, entry.name);

      if (ignore.matches(fullPath)) {
        continue;
      }

      if (entry.isDirectory()) {
        index.setDirKnown(mapper.toRelative(fullPath));
        watcher.addPath(fullPath);
        await this.walkDirectory(fullPath);
      } else if (entry.isFile()) {
        index.setFile(mapper.toRelative(fullPath), await checksum.fingerprint(fullPath));
      }
    }
  }
}
