/**
 * Output Formatter
 * 
 * Console output around the log stream: start banner and fatal errors.
 */

import chalk from 'chalk';
import type { DaemonConfig } from '../config/index.js';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printBanner(config: DaemonConfig, version: string): void {
  printHeader(`tiersync ${version}`);
  printKeyValue('Root', config.root);
  printKeyValue('Renter', config.sia.address);
  printKeyValue('Staging', config.sync.stagingPrefix);
  printKeyValue('Production', config.sync.productionPrefix);
  printKeyValue('Redundancy', `${config.sync.redundancy.dataPieces}+${config.sync.redundancy.parityPieces}`);
  printKeyValue('Categories', config.promotion.categories.join(', '));
  printKeyValue('Promotion', `every ${config.promotion.intervalMs}ms above ${config.promotion.threshold}`);
  printKeyValue('Archive', config.sync.archive ? 'on' : 'off');
  console.log();

  if (config.sync.dryRun) {
    printWarning('Dry run: the renter will not be modified');
  }
}
