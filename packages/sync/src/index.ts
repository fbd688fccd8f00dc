/**
 * @tiersync/sync
 * 
 * Two-tier synchronization engine.
 * 
 * A local directory tree is mirrored into the staging namespace of a remote
 * store; directories move to production once the store reports them
 * replicated above a threshold.
 * 
 * Pieces:
 * - Local state index (relative path -> fingerprint, namespace)
 * - Checksum providers (size, sha256)
 * - Namespace mapping between local and remote paths
 * - fs.watch based folder watcher
 * - Reconciliation, event dispatch, create retry, promotion
 */

// State
export { LocalStateIndex, toIndexKey } from './state/localStateIndex.js';
export { createChecksumProvider, type ChecksumProvider } from './state/checksum.js';

// Namespaces
export {
  NamespaceMapper,
  type NamespaceMapperConfig,
  type RemoteLocation,
} from './namespace/namespaceMapper.js';

// Watcher
export { FolderWatcher, type WatcherConfig } from './watcher/folderWatcher.js';
export { IgnoreRules, type IgnoreConfig } from './watcher/ignore.js';
export type {
  DirectoryWatcher,
  WatchEvent,
  WatchEventKind,
  WatcherError,
} from './watcher/types.js';

// Engine
export {
  FileOperations,
  type FileOperationsConfig,
  type FileOperationStats,
  type WriteOutcome,
} from './engine/fileOperations.js';
export { CreateRetryPolicy, type CreateRetryConfig } from './engine/createRetry.js';
export { Reconciler, type ReconcilerConfig, type ReconcileResult } from './engine/reconciler.js';
export { EventDispatcher, type EventDispatcherConfig } from './engine/eventDispatcher.js';
export {
  PromotionScheduler,
  type PromotionSchedulerConfig,
  type Promotion,
  type PromotionFailure,
  type TickResult,
} from './engine/promotionScheduler.js';

// Lifecycle
export {
  SyncFolder,
  SYNC_DEFAULTS,
  type SyncFolderOptions,
  type CloseOptions,
} from './syncFolder.js';
