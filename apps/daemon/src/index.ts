#!/usr/bin/env -S node --import tsx
/**
 * Daemon Entry Point
 * 
 * Startup:
 * - Load .env, merge command line flags, validate
 * - Check that the renter API answers
 * - Open the sync folder (walk, reconcile, start watching and promoting)
 * 
 * Runs until SIGINT/SIGTERM, then closes the sync folder. Exits 1 when
 * startup fails or shutdown does not finish within 30 seconds.
 */

import { ConfigError, formatError } from '@tiersync/core';
import { SiaRenterClient } from '@tiersync/renter';
import { SyncFolder } from '@tiersync/sync';
import { formatDuration } from '@tiersync/utils';
import { createProgram, VERSION } from './cli.js';
import { loadConfig, loadEnvFile, type CliOptions } from './config/index.js';
import { createDaemonLogger } from './lib/logger.js';
import { printBanner, printError, printSuccess } from './lib/output.js';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function start(cli: CliOptions): Promise<void> {
  loadEnvFile();
  const config = loadConfig(cli);
  const logger = createDaemonLogger(config);

  printBanner(config, VERSION);

  const store = new SiaRenterClient({
    address: config.sia.address,
    password: config.sia.password || undefined,
    agent: config.sia.agent,
    timeoutMs: config.sia.timeoutMs,
  });

  let renterVersion: string;
  try {
    renterVersion = await store.ping();
  } catch (error) {
    throw new ConfigError(`Renter API at ${config.sia.address} is not reachable: ${formatError(error)}`);
  }
  logger.info({ address: config.sia.address, version: renterVersion }, 'Connected to renter');

  const folder = await SyncFolder.open({
    root: config.root,
    store,
    stagingPrefix: config.sync.stagingPrefix,
    productionPrefix: config.sync.productionPrefix,
    archive: config.sync.archive,
    dryRun: config.sync.dryRun,
    redundancy: config.sync.redundancy,
    checksum: config.sync.checksum,
    categories: config.promotion.categories,
    promotionIntervalMs: config.promotion.intervalMs,
    promotionThreshold: config.promotion.threshold,
    createRetryAttempts: config.sync.createRetryAttempts,
    createRetryDelayMs: config.sync.createRetryDelayMs,
    debounceMs: config.sync.debounceMs,
    logger,
  });

  const { reconciled } = folder;
  printSuccess(
    `Watching ${config.root} (${reconciled.files} files, ${reconciled.uploaded} uploaded, ` +
    `${reconciled.reuploaded} replaced in ${formatDuration(reconciled.durationMs)})`
  );

  // Graceful shutdown
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Shutdown signal received');

    const forceExitTimeout = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      await folder.close();
      clearTimeout(forceExitTimeout);
      logger.info({ ...folder.stats }, 'Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: formatError(error) }, 'Error during shutdown');
      clearTimeout(forceExitTimeout);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason: formatError(reason) }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });
}

createProgram(start)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    printError(formatError(error));
    process.exit(1);
  });
