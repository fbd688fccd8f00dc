/**
 * Event Dispatcher
 * 
 * Applies watcher events to the index and the remote store one at a time, in
 * arrival order. Events that arrive before `start()` (during reconciliation)
 * wait behind a gate; events still queued at `stop()` are dropped.
 * 
 * A failing event is logged and dropped. It never stops the queue.
 */

import type { Dirent, Stats } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { IOError, ShutdownError, formatError } from '@tiersync/core';
import { createLogger, isErrnoException, statIfExists, type Logger } from '@tiersync/utils';
import type { LocalStateIndex } from '../state/localStateIndex.js';
import type { NamespaceMapper } from '../namespace/namespaceMapper.js';
import type { IgnoreRules } from '../watcher/ignore.js';
import type { DirectoryWatcher, WatchEvent } from '../watcher/types.js';
import type { FileOperations } from './fileOperations.js';
import type { CreateRetryPolicy } from './createRetry.js';

export interface EventDispatcherConfig {
  index: LocalStateIndex;
  mapper: NamespaceMapper;
  operations: FileOperations;
  createRetry: CreateRetryPolicy;
  watcher: DirectoryWatcher;
  ignore: IgnoreRules;
  logger?: Logger;
}

export class EventDispatcher {
  private readonly config: EventDispatcherConfig;
  private readonly logger: Logger;
  private queue: Promise<void>;
  private releaseGate: () => void = () => undefined;
  private unsubscribers: Array<() => void> = [];
  private stopped = false;
  private pending = 0;

  constructor(config: EventDispatcherConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger({ component: 'event-dispatcher' });
    this.queue = new Promise<void>(resolve => {
      this.releaseGate = resolve;
    });
  }

  /**
   * Subscribe to the watcher. Events are buffered until `start()`.
   */
  attach(): void {
    if (this.unsubscribers.length > 0) {
      return;
    }

    const { watcher } = this.config;
    this.unsubscribers.push(
      watcher.onEvent(event => this.enqueue(event)),
      watcher.onError(({ path, error }) => {
        this.logger.warn({ path, error: formatError(error) }, 'Watcher error');
      })
    );
  }

  /**
   * Release buffered events and process new ones as they arrive
   */
  start(): void {
    this.releaseGate();
  }

  enqueue(event: WatchEvent): void {
    if (this.stopped) {
      return;
    }

    this.pending++;
    this.queue = this.queue.then(async () => {
      this.pending--;
      if (!this.stopped) {
        await this.process(event);
      }
    });
  }

  /**
   * Stop accepting events and drop the queued ones. The event in progress
   * keeps running; `stop()` waits for it.
   */
  halt(): void {
    if (this.stopped) {
      return;
    }

    this.stopped = true;
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.releaseGate();
  }

  async stop(): Promise<void> {
    this.halt();
    await this.idle();
    this.logger.debug('Event dispatcher stopped');
  }

  /**
   * Resolves once the queue is empty, including events enqueued while waiting
   */
  async idle(): Promise<void> {
    let current: Promise<void> | undefined;
    while (current !== this.queue) {
      current = this.queue;
      await current;
    }
  }

  get queued(): number {
    return this.pending;
  }

  private async process(event: WatchEvent): Promise<void> {
    const { mapper } = this.config;

    let relativePath: string;
    try {
      relativePath = mapper.toRelative(event.path);
    } catch (error) {
      this.logger.debug({ path: event.path, error: formatError(error) }, 'Event outside the synchronized tree');
      return;
    }

    try {
      if (event.kind === 'remove') {
        await this.handleRemoveEvent(relativePath, event.path);
      } else {
        await this.handleChangeEvent(event, relativePath);
      }
    } catch (error) {
      if (error instanceof ShutdownError) {
        this.logger.debug({ path: relativePath, kind: event.kind }, 'Event interrupted by shutdown');
        return;
      }
      this.logger.error(
        { path: relativePath, kind: event.kind, error: formatError(error) },
        'Event dropped'
      );
    }
  }

  private async handleChangeEvent(event: WatchEvent, relativePath: string): Promise<void> {
    const { index, operations, createRetry } = this.config;

    let stats: Stats | null;
    try {
      stats = await statIfExists(event.path);
    } catch (error) {
      throw new IOError(event.path, 'stat', error);
    }

    if (!stats) {
      this.logger.debug({ path: relativePath, kind: event.kind }, 'Path vanished before handling');
      return;
    }

    if (stats.isDirectory()) {
      if (event.kind === 'create') {
        await this.handleNewDirectory(relativePath, event.path);
      }
      return;
    }

    if (!stats.isFile()) {
      return;
    }

    // Atomic replace shows up as a create on a known path
    if (event.kind === 'write' || index.getFile(relativePath)) {
      await operations.handleWrite(relativePath);
      return;
    }

    await createRetry.run(relativePath);
  }

  private async handleRemoveEvent(relativePath: string, fullPath: string): Promise<void> {
    const { index, operations, watcher } = this.config;

    if (index.hasDir(relativePath)) {
      for (const file of index.filesBelow(relativePath)) {
        if (this.stopped) {
          return;
        }
        try {
          await operations.handleRemove(file);
        } catch (error) {
          this.logger.error({ path: file, error: formatError(error) }, 'Delete failed');
        }
      }

      const removed = index.removeDir(relativePath);
      watcher.removePath(fullPath);
      this.logger.info({ path: relativePath, directories: removed.length }, 'Directory removed');
      return;
    }

    if (index.getFile(relativePath)) {
      await operations.handleRemove(relativePath);
      return;
    }

    this.logger.debug({ path: relativePath }, 'Remove of unknown path ignored');
  }

  /**
   * Watch a new directory and queue creates for anything already inside it
   */
  private async handleNewDirectory(relativePath: string, fullPath: string): Promise<void> {
    const { index, watcher, ignore } = this.config;

    if (!index.hasDir(relativePath)) {
      index.setDirKnown(relativePath);
      this.logger.info({ path: relativePath }, 'Directory added');
    }
    watcher.addPath(fullPath);

    let entries: Dirent[];
    try {
      entries = await readdir(fullPath, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw new IOError(fullPath, 'read directory', error);
    }

    for (const entry of entries) {
      const childPath = join(fullPath, entry.name);
      if (ignore.matches(childPath)) {
        continue;
      }

      const childRelative = `${relativePath}/${entry.name}`;
      const known = entry.isDirectory() ? index.hasDir(childRelative) : index.getFile(childRelative);

      if (!known && (entry.isDirectory() || entry.isFile())) {
        this.enqueue({ kind: 'create', path: childPath, timestamp: new Date() });
      }
    }
  }
}
