/**
 * File Operations
 * 
 * The three primitives that keep one index entry and its remote object in
 * step. Paths are index keys (see `toIndexKey`); the mapper turns them into
 * absolute local paths and remote paths.
 * 
 * - handleCreate: fingerprint, upload to staging, record
 * - handleRemove: delete the current remote object, forget
 * - handleWrite:  compare fingerprints, replace the remote object on change
 */

import { ShutdownError, type RedundancyConfig, type RemoteStore } from '@tiersync/core';
import { createLogger, type Logger } from '@tiersync/utils';
import type { LocalStateIndex } from '../state/localStateIndex.js';
import type { ChecksumProvider } from '../state/checksum.js';
import type { NamespaceMapper } from '../namespace/namespaceMapper.js';

export type WriteOutcome = 'untracked' | 'unchanged' | 'reuploaded';

export interface FileOperationsConfig {
  index: LocalStateIndex;
  store: RemoteStore;
  mapper: NamespaceMapper;
  checksum: ChecksumProvider;
  redundancy: RedundancyConfig;

  // Keep superseded remote objects instead of deleting them
  archive: boolean;

  // Record index changes without calling the remote store
  dryRun?: boolean;

  signal?: AbortSignal;
  logger?: Logger;
}

export interface FileOperationStats {
  uploaded: number;
  deleted: number;
}

export class FileOperations {
  private readonly config: FileOperationsConfig;
  private readonly logger: Logger;
  private readonly counters: FileOperationStats = { uploaded: 0, deleted: 0 };
  private isHalted = false;

  constructor(config: FileOperationsConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger({ component: 'file-operations' });
  }

  get archive(): boolean {
    return this.config.archive;
  }

  get dryRun(): boolean {
    return this.config.dryRun ?? false;
  }

  get stats(): FileOperationStats {
    return { ...this.counters };
  }

  get halted(): boolean {
    return this.isHalted;
  }

  /**
   * Refuse every remote call from now on. Calls already started finish.
   */
  halt(): void {
    this.isHalted = true;
  }

  async handleCreate(relativePath: string): Promise<void> {
    const { index, store, mapper, checksum, redundancy, signal } = this.config;
    const localPath = mapper.toAbsolute(relativePath);
    const remotePath = mapper.toRemote(relativePath, 'staging');
    const fingerprint = await checksum.fingerprint(localPath);

    if (!this.dryRun) {
      this.ensureRunning('upload', remotePath);
      await store.uploadFile(localPath, remotePath, redundancy, { signal });
      this.counters.uploaded++;
    }

    index.setFile(relativePath, fingerprint, 'staging');
    this.logger.info({ path: relativePath, remotePath, dryRun: this.dryRun }, 'Uploaded');
  }

  async handleRemove(relativePath: string): Promise<void> {
    const { index, store, mapper, signal } = this.config;
    const namespace = index.getFile(relativePath)?.namespace ?? 'staging';
    const remotePath = mapper.toRemote(relativePath, namespace);

    if (!this.dryRun) {
      this.ensureRunning('delete', remotePath);
      await store.deleteFile(remotePath, { signal });
      this.counters.deleted++;
    }

    index.removeFile(relativePath);
    this.logger.info({ path: relativePath, remotePath, dryRun: this.dryRun }, 'Deleted');
  }

  async handleWrite(relativePath: string): Promise<WriteOutcome> {
    const { index, mapper, checksum } = this.config;
    const entry = index.getFile(relativePath);

    if (!entry) {
      return 'untracked';
    }

    const fingerprint = await checksum.fingerprint(mapper.toAbsolute(relativePath));
    if (fingerprint === entry.fingerprint) {
      return 'unchanged';
    }

    this.logger.debug(
      { path: relativePath, previous: entry.fingerprint, current: fingerprint },
      'Content changed'
    );

    // The entry keeps the old fingerprint until handleCreate records the new one
    if (!this.archive) {
      await this.handleRemove(relativePath);
    }
    await this.handleCreate(relativePath);

    return 'reuploaded';
  }

  private ensureRunning(operation: string, remotePath: string): void {
    if (this.isHalted) {
      throw new ShutdownError(operation, remotePath);
    }
  }
}
