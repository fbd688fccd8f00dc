/**
 * Create-Retry Policy
 * 
 * A create notification can race an upload of the same path that is already
 * in flight or finished (the renter refuses to overwrite). On failure the
 * policy looks for the staging object, deletes it when superseded objects are
 * not archived, and tries the create again.
 */

import { IOError, RaceError, formatError, type RemoteStore } from '@tiersync/core';
import { createLogger, retry, type Logger } from '@tiersync/utils';
import type { NamespaceMapper } from '../namespace/namespaceMapper.js';
import type { FileOperations } from './fileOperations.js';

export interface CreateRetryConfig {
  operations: FileOperations;
  store: RemoteStore;
  mapper: NamespaceMapper;

  // Total create attempts, including the first
  maxAttempts?: number;

  // Delay before each retry in ms
  delayMs?: number;

  signal?: AbortSignal;
  logger?: Logger;
}

export class CreateRetryPolicy {
  private readonly config: CreateRetryConfig;
  private readonly logger: Logger;

  constructor(config: CreateRetryConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger({ component: 'create-retry' });
  }

  /**
   * Create with recovery. Resolves true once the file is uploaded and indexed,
   * false when the create was given up and logged.
   */
  async run(relativePath: string): Promise<boolean> {
    const { operations, maxAttempts = 2, delayMs = 500, signal } = this.config;

    try {
      await retry(() => operations.handleCreate(relativePath), {
        maxAttempts,
        initialDelay: delayMs,
        maxDelay: delayMs,
        backoffMultiplier: 1,
        // Local failures are not retried
        retryIf: (error) => !(error instanceof IOError) && !signal?.aborted && !operations.halted,
        onRetry: (error, attempt) => this.recover(relativePath, error, attempt),
      });
      return true;
    } catch (error) {
      if (error instanceof IOError || signal?.aborted || operations.halted) {
        this.logger.warn({ path: relativePath, error: formatError(error) }, 'Create dropped');
      } else {
        const race = new RaceError(relativePath, error);
        this.logger.error({ path: relativePath, error: formatError(race) }, 'Create abandoned');
      }
      return false;
    }
  }

  private async recover(relativePath: string, error: unknown, attempt: number): Promise<void> {
    const { operations, store, mapper, signal } = this.config;
    const remotePath = mapper.toRemote(relativePath, 'staging');

    this.logger.warn({ path: relativePath, remotePath, attempt, error: formatError(error) }, 'Create failed, retrying');
    if (operations.halted) {
      return;
    }

    let exists: boolean;
    try {
      exists = await store.fileExists(remotePath, { signal });
    } catch (checkError) {
      this.logger.warn({ remotePath, error: formatError(checkError) }, 'Existence check failed');
      return;
    }

    if (!exists || operations.archive) {
      return;
    }

    try {
      await operations.handleRemove(relativePath);
    } catch (removeError) {
      this.logger.warn({ remotePath, error: formatError(removeError) }, 'Could not delete conflicting object');
    }
  }
}
