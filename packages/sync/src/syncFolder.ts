/**
 * Sync Folder
 * 
 * Wires the engine together for one synchronized root and owns its lifecycle:
 * 
 *   open():  validate root -> attach dispatcher -> reconcile -> start
 *            dispatcher -> start promotion scheduler
 *   close(): halt operations, dispatcher and scheduler -> drain dispatcher
 *            -> drain scheduler -> stop watcher
 * 
 * Watcher events that arrive while reconciliation runs are buffered by the
 * dispatcher and applied after it.
 */

import {
  ConfigError,
  type ChecksumMode,
  type RedundancyConfig,
  type RemoteStore,
} from '@tiersync/core';
import { createLogger, statIfExists, type Logger } from '@tiersync/utils';
import { LocalStateIndex } from './state/localStateIndex.js';
import { createChecksumProvider } from './state/checksum.js';
import { NamespaceMapper } from './namespace/namespaceMapper.js';
import { FolderWatcher } from './watcher/folderWatcher.js';
import { IgnoreRules, type IgnoreConfig } from './watcher/ignore.js';
import type { DirectoryWatcher } from './watcher/types.js';
import { FileOperations, type FileOperationStats } from './engine/fileOperations.js';
import { CreateRetryPolicy } from './engine/createRetry.js';
import { Reconciler, type ReconcileResult } from './engine/reconciler.js';
import { EventDispatcher } from './engine/eventDispatcher.js';
import { PromotionScheduler } from './engine/promotionScheduler.js';

export interface SyncFolderOptions {
  root: string;
  store: RemoteStore;
  stagingPrefix: string;
  productionPrefix: string;
  archive?: boolean;
  dryRun?: boolean;
  redundancy?: RedundancyConfig;
  checksum?: ChecksumMode;
  categories?: string[];
  promotionIntervalMs?: number;
  promotionThreshold?: number;
  createRetryAttempts?: number;
  createRetryDelayMs?: number;
  debounceMs?: number;
  ignore?: IgnoreConfig;

  // Replaces the fs.watch based watcher
  watcher?: DirectoryWatcher;

  logger?: Logger;
}

export interface CloseOptions {
  // Abort in-flight remote calls instead of letting them finish
  abort?: boolean;
}

export const SYNC_DEFAULTS = {
  archive: true,
  redundancy: { dataPieces: 10, parityPieces: 30 },
  checksum: 'size',
  categories: ['movies', 'tv'],
  promotionIntervalMs: 5000,
  promotionThreshold: 1,
  createRetryAttempts: 2,
  createRetryDelayMs: 500,
  debounceMs: 100,
} as const;

interface SyncFolderParts {
  index: LocalStateIndex;
  watcher: DirectoryWatcher;
  operations: FileOperations;
  dispatcher: EventDispatcher;
  scheduler: PromotionScheduler;
  controller: AbortController;
  reconciled: ReconcileResult;
  logger: Logger;
}

export class SyncFolder {
  readonly index: LocalStateIndex;
  readonly scheduler: PromotionScheduler;
  readonly reconciled: ReconcileResult;
  private readonly watcher: DirectoryWatcher;
  private readonly operations: FileOperations;
  private readonly dispatcher: EventDispatcher;
  private readonly controller: AbortController;
  private readonly logger: Logger;
  private closing: Promise<void> | null = null;

  private constructor(parts: SyncFolderParts) {
    this.index = parts.index;
    this.watcher = parts.watcher;
    this.operations = parts.operations;
    this.dispatcher = parts.dispatcher;
    this.scheduler = parts.scheduler;
    this.controller = parts.controller;
    this.reconciled = parts.reconciled;
    this.logger = parts.logger;
  }

  static async open(options: SyncFolderOptions): Promise<SyncFolder> {
    const logger = options.logger ?? createLogger({ component: 'sync-folder' });
    const child = (component: string): Logger => logger.child({ component });

    const stats = await statIfExists(options.root);
    if (!stats) {
      throw new ConfigError(`Synchronized root ${options.root} does not exist`);
    }
    if (!stats.isDirectory()) {
      throw new ConfigError(`Synchronized root ${options.root} is not a directory`);
    }

    const controller = new AbortController();
    const { signal } = controller;
    const dryRun = options.dryRun ?? false;

    const mapper = new NamespaceMapper({
      root: options.root,
      stagingPrefix: options.stagingPrefix,
      productionPrefix: options.productionPrefix,
    });
    const index = new LocalStateIndex();
    const checksum = createChecksumProvider(options.checksum ?? SYNC_DEFAULTS.checksum);
    const ignore = new IgnoreRules(options.ignore);
    const watcher = options.watcher ?? new FolderWatcher({
      debounceMs: options.debounceMs ?? SYNC_DEFAULTS.debounceMs,
      ignore: options.ignore,
      logger: child('folder-watcher'),
    });

    const operations = new FileOperations({
      index,
      store: options.store,
      mapper,
      checksum,
      redundancy: options.redundancy ?? SYNC_DEFAULTS.redundancy,
      archive: options.archive ?? SYNC_DEFAULTS.archive,
      dryRun,
      signal,
      logger: child('file-operations'),
    });
    const createRetry = new CreateRetryPolicy({
      operations,
      store: options.store,
      mapper,
      maxAttempts: options.createRetryAttempts ?? SYNC_DEFAULTS.createRetryAttempts,
      delayMs: options.createRetryDelayMs ?? SYNC_DEFAULTS.createRetryDelayMs,
      signal,
      logger: child('create-retry'),
    });
    const dispatcher = new EventDispatcher({
      index,
      mapper,
      operations,
      createRetry,
      watcher,
      ignore,
      logger: child('event-dispatcher'),
    });
    const reconciler = new Reconciler({
      index,
      store: options.store,
      mapper,
      checksum,
      operations,
      watcher,
      ignore,
      signal,
      logger: child('reconciler'),
    });
    const scheduler = new PromotionScheduler({
      store: options.store,
      index,
      mapper,
      categories: options.categories ?? [...SYNC_DEFAULTS.categories],
      intervalMs: options.promotionIntervalMs ?? SYNC_DEFAULTS.promotionIntervalMs,
      threshold: options.promotionThreshold ?? SYNC_DEFAULTS.promotionThreshold,
      dryRun,
      signal,
      logger: child('promotion-scheduler'),
    });

    dispatcher.attach();

    let reconciled: ReconcileResult;
    try {
      reconciled = await reconciler.reconcile();
    } catch (error) {
      await dispatcher.stop();
      await watcher.stop();
      throw error;
    }

    dispatcher.start();
    scheduler.start();
    logger.info({ root: mapper.root, staging: mapper.stagingPrefix, production: mapper.productionPrefix }, 'Sync folder open');

    return new SyncFolder({
      index,
      watcher,
      operations,
      dispatcher,
      scheduler,
      controller,
      reconciled,
      logger,
    });
  }

  get stats(): FileOperationStats {
    return this.operations.stats;
  }

  /**
   * Resolves once every queued watcher event has been applied
   */
  idle(): Promise<void> {
    return this.dispatcher.idle();
  }

  close(options: CloseOptions = {}): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown(options);
    }
    return this.closing;
  }

  private async shutdown(options: CloseOptions): Promise<void> {
    // Nothing starts a remote call past this point
    this.operations.halt();
    this.dispatcher.halt();
    this.scheduler.halt();

    if (options.abort) {
      this.controller.abort();
    }

    await this.dispatcher.stop();
    await this.scheduler.stop();
    await this.watcher.stop();
    this.logger.info('Sync folder closed');
  }
}
