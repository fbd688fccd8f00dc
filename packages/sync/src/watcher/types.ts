/**
 * Directory Watcher contract consumed by the sync engine
 */

export type WatchEventKind = 'create' | 'write' | 'remove';

export interface WatchEvent {
  kind: WatchEventKind;
  // Absolute path
  path: string;
  timestamp: Date;
}

export interface WatcherError {
  path: string;
  error: unknown;
}

export interface DirectoryWatcher {
  // Watch the direct children of a directory
  addPath(dirPath: string): void;

  // Stop watching a directory and everything registered below it
  removePath(dirPath: string): void;

  onEvent(handler: (event: WatchEvent) => void): () => void;

  onError(handler: (error: WatcherError) => void): () => void;

  stop(): Promise<void>;
}
