/**
 * DirectoryWatcher driven by hand from tests
 */

import { resolve } from 'node:path';
import type { DirectoryWatcher, WatchEvent, WatchEventKind, WatcherError } from '../watcher/types.js';

export class FakeWatcher implements DirectoryWatcher {
  readonly paths = new Set<string>();
  stopped = false;
  private readonly eventHandlers = new Set<(event: WatchEvent) => void>();
  private readonly errorHandlers = new Set<(error: WatcherError) => void>();

  addPath(dirPath: string): void {
    this.paths.add(resolve(dirPath));
  }

  removePath(dirPath: string): void {
    const dir = resolve(dirPath);
    for (const path of [...this.paths]) {
      if (path === dir || path.startsWith(`${dir}/`)) {
        this.paths.delete(path);
      }
    }
  }

  onEvent(handler: (event: WatchEvent) => void): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  onError(handler: (error: WatcherError) => void): () => void {
    this.errorHandlers.add(handler);
    return () => this.errorHandlers.delete(handler);
  }

  emit(kind: WatchEventKind, path: string): void {
    const event: WatchEvent = { kind, path, timestamp: new Date() };
    for (const handler of this.eventHandlers) {
      handler(event);
    }
  }

  emitError(path: string, error: unknown): void {
    for (const handler of this.errorHandlers) {
      handler({ path, error });
    }
  }

  get listenerCount(): number {
    return this.eventHandlers.size;
  }

  async stop(): Promise<void> {
    this.stopped = true;
  }
}
