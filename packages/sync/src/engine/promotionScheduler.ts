/**
 * Promotion Scheduler
 * 
 * Periodically asks the remote store how well each category directory under
 * staging is replicated and renames every child whose aggregate minimum
 * redundancy is above the threshold into production.
 * 
 * Ticks are chained with setTimeout, so a slow tick delays the next one
 * instead of overlapping it. Health is fetched fresh on every tick.
 */

import { EventEmitter } from 'node:events';
import { formatError, type DirectoryHealthEntry, type RemoteStore } from '@tiersync/core';
import { joinRemotePath } from '@tiersync/renter';
import { createLogger, type Logger } from '@tiersync/utils';
import type { LocalStateIndex } from '../state/localStateIndex.js';
import type { NamespaceMapper } from '../namespace/namespaceMapper.js';

export interface PromotionSchedulerConfig {
  store: RemoteStore;
  index: LocalStateIndex;
  mapper: NamespaceMapper;

  // Directories below the staging prefix whose children are checked; "." is
  // the staging prefix itself
  categories: string[];

  // Delay between ticks in ms
  intervalMs: number;

  // Promote when aggregate minimum redundancy is strictly greater
  threshold: number;

  dryRun?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Promotion {
  from: string;
  to: string;
}

export interface PromotionFailure {
  path: string;
  error: string;
}

export interface TickResult {
  promoted: Promotion[];
  failed: PromotionFailure[];
}

export class PromotionScheduler extends EventEmitter {
  private readonly config: PromotionSchedulerConfig;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private isRunning = false;
  private stopping = false;

  constructor(config: PromotionSchedulerConfig) {
    super();
    this.config = config;
    this.logger = config.logger ?? createLogger({ component: 'promotion-scheduler' });
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.stopping = false;
    this.schedule();
    this.logger.info(
      { categories: this.config.categories, intervalMs: this.config.intervalMs, threshold: this.config.threshold },
      'Promotion scheduler started'
    );
  }

  /**
   * Cancel the pending tick. A running tick starts no further remote call.
   */
  halt(): void {
    this.stopping = true;
    this.isRunning = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Halt and wait for the running tick to wind down
   */
  async stop(): Promise<void> {
    this.halt();

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * One pass over every category
   */
  async tick(): Promise<TickResult> {
    const { store, mapper, categories, signal } = this.config;
    const result: TickResult = { promoted: [], failed: [] };

    for (const category of categories) {
      if (this.stopping) {
        break;
      }

      const categoryPath = category === '.' ? mapper.stagingPrefix : joinRemotePath(mapper.stagingPrefix, category);

      let children: DirectoryHealthEntry[];
      try {
        const health = await store.getDirectoryHealth(categoryPath, { signal });
        // Index 0 is the category directory itself
        children = health.children.slice(1);
      } catch (error) {
        this.logger.warn({ remotePath: categoryPath, error: formatError(error) }, 'Health check failed');
        result.failed.push({ path: categoryPath, error: formatError(error) });
        continue;
      }

      for (const child of children) {
        if (this.stopping) {
          break;
        }
        if (child.aggregateMinRedundancy <= this.config.threshold) {
          continue;
        }

        try {
          result.promoted.push(await this.promote(child.remotePath, child.aggregateMinRedundancy));
        } catch (error) {
          this.logger.warn({ remotePath: child.remotePath, error: formatError(error) }, 'Promotion failed');
          result.failed.push({ path: child.remotePath, error: formatError(error) });
        }
      }
    }

    this.emit('tick', result);
    return result;
  }

  private async promote(stagingPath: string, redundancy: number): Promise<Promotion> {
    const { store, index, mapper, dryRun, signal } = this.config;
    const target = mapper.promotionTarget(stagingPath);

    if (!dryRun) {
      await store.renamePath(stagingPath, target, { signal });
    }

    const location = mapper.fromRemote(stagingPath);
    const files = location ? index.promote(location.relativePath) : 0;

    const promotion: Promotion = { from: stagingPath, to: target };
    this.logger.info({ ...promotion, redundancy, files, dryRun: dryRun ?? false }, 'Promoted');
    this.emit('promoted', promotion);
    return promotion;
  }

  private schedule(): void {
    if (this.stopping) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick()
        .then(
          () => undefined,
          (error: unknown) => {
            this.logger.error({ error: formatError(error) }, 'Promotion tick failed');
          }
        )
        .finally(() => {
          this.inFlight = null;
          this.schedule();
        });
    }, this.config.intervalMs);
  }
}
