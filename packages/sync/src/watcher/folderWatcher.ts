/**
 * Folder Watcher Service
 * 
 * Monitors directories for file changes using native fs.watch with debouncing.
 * Each directory gets its own non-recursive watch; subdirectories discovered
 * later are added with `addPath`.
 * 
 * Raw fs.watch events are classified after the debounce delay:
 * - 'rename' on a path that exists      -> create
 * - 'rename' on a path that is gone     -> remove
 * - 'change' on an existing file        -> write
 * 
 * Classification runs through one serial chain so events leave the watcher
 * in the order their debounce timers fired.
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { join, resolve, sep } from 'node:path';
import { formatError } from '@tiersync/core';
import { statIfExists, createLogger, type Logger } from '@tiersync/utils';
import { IgnoreRules, type IgnoreConfig } from './ignore.js';
import type { DirectoryWatcher, WatchEvent, WatchEventKind, WatcherError } from './types.js';

export interface WatcherConfig {
  // Debounce delay in ms
  debounceMs?: number;

  ignore?: IgnoreConfig;

  logger?: Logger;
}

export class FolderWatcher extends EventEmitter implements DirectoryWatcher {
  private readonly debounceMs: number;
  private readonly ignore: IgnoreRules;
  private readonly logger: Logger;
  private watchers: Map<string, FSWatcher> = new Map();
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private processing: Promise<void> = Promise.resolve();
  private isStopped = false;

  constructor(config: WatcherConfig = {}) {
    super();
    this.debounceMs = config.debounceMs ?? 100;
    this.ignore = new IgnoreRules(config.ignore);
    this.logger = config.logger ?? createLogger({ component: 'folder-watcher' });
  }

  /**
   * Add a directory to watch
   */
  addPath(dirPath: string): void {
    const dir = resolve(dirPath);

    if (this.isStopped || this.watchers.has(dir)) {
      return;
    }

    try {
      const watcher = watch(dir, { persistent: true }, (eventType, filename) => {
        if (filename) {
          this.handleFileEvent(eventType, dir, filename);
        }
      });

      watcher.on('error', (error) => {
        this.emitError(dir, error);
      });

      this.watchers.set(dir, watcher);
      this.logger.debug({ path: dir }, 'Watching directory');
    } catch (error) {
      this.emitError(dir, error);
    }
  }

  /**
   * Remove a directory, and every watched directory below it, from watching
   */
  removePath(dirPath: string): void {
    const dir = resolve(dirPath);

    for (const [path, watcher] of this.watchers) {
      if (path === dir || path.startsWith(dir + sep)) {
        watcher.close();
        this.watchers.delete(path);
      }
    }
  }

  onEvent(handler: (event: WatchEvent) => void): () => void {
    this.on('event', handler);
    return () => this.off('event', handler);
  }

  onError(handler: (error: WatcherError) => void): () => void {
    this.on('error', handler);
    return () => this.off('error', handler);
  }

  /**
   * Stop watching all directories
   */
  async stop(): Promise<void> {
    this.isStopped = true;

    for (const [path, watcher] of this.watchers) {
      watcher.close();
      this.watchers.delete(path);
    }

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();

    await this.processing;
    this.emit('close');
  }

  /**
   * Get currently watched paths
   */
  getWatchedPaths(): string[] {
    return Array.from(this.watchers.keys());
  }

  get running(): boolean {
    return !this.isStopped;
  }

  private handleFileEvent(eventType: string, dirPath: string, filename: string): void {
    const fullPath = join(dirPath, filename);
    
    if (this.ignore.matches(fullPath)) {
      return;
    }

    const debounceKey = `${eventType}:${fullPath}`;
    const existingTimer = this.debounceTimers.get(debounceKey);
    
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(debounceKey);
      this.processing = this.processing.then(() => this.processFileEvent(eventType, fullPath));
    }, this.debounceMs);

    this.debounceTimers.set(debounceKey, timer);
  }

  private async processFileEvent(eventType: string, fullPath: string): Promise<void> {
    if (this.isStopped) {
      return;
    }

    try {
      const stats = await statIfExists(fullPath);

      if (eventType === 'rename') {
        this.queueEvent(stats ? 'create' : 'remove', fullPath);
      } else if (eventType === 'change' && stats?.isFile()) {
        this.queueEvent('write', fullPath);
      }
    } catch (error) {
      this.emitError(fullPath, error);
    }
  }

  private queueEvent(kind: WatchEventKind, fullPath: string): void {
    const event: WatchEvent = {
      kind,
      path: fullPath,
      timestamp: new Date(),
    };

    this.emit('event', event);
  }

  private emitError(path: string, error: unknown): void {
    if (this.listenerCount('error') === 0) {
      this.logger.warn({ path, error: formatError(error) }, 'Watcher error');
      return;
    }
    const payload: WatcherError = { path, error };
    this.emit('error', payload);
  }
}
