/**
 * Command line definition
 */

import { Command, Option } from 'commander';
import type { CliOptions } from './config/index.js';

export const VERSION = '0.1.0';

type CommandOptions = Omit<CliOptions, 'root'>;

export function createProgram(run: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name('tiersync')
    .description('Mirror a local directory into a Sia renter and promote replicated directories')
    .version(VERSION)
    .argument('[directory]', 'directory to synchronize (default: $TIERSYNC_ROOT)')
    .option('--address <host:port>', 'renter API address (default: 127.0.0.1:9980)')
    .option('--password <password>', 'renter API password')
    .option('--agent <agent>', 'user agent sent to the renter (default: Sia-Agent)')
    .option('--staging-dir <prefix>', 'remote prefix for new uploads (default: fuse/staging)')
    .option('--production-dir <prefix>', 'remote prefix for promoted directories (default: fuse/prod)')
    .option('--archive', 'keep superseded remote copies (default)')
    .option('--no-archive', 'delete the remote copy before re-uploading a changed file')
    .option('--dry-run', 'log what would change without touching the renter')
    .option('--data-pieces <n>', 'erasure coding data pieces (default: 10)')
    .option('--parity-pieces <n>', 'erasure coding parity pieces (default: 30)')
    .option('--interval <ms>', 'promotion check interval (default: 5000)')
    .option('--threshold <redundancy>', 'promote above this aggregate minimum redundancy (default: 1)')
    .option('--categories <list>', 'comma separated directories under staging to promote from (default: movies,tv)')
    .addOption(new Option('--checksum <mode>', 'change detection (default: size)').choices(['size', 'sha256']))
    .addOption(
      new Option('--log-level <level>', 'log level (default: info)')
        .choices(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    )
    .action(async (directory: string | undefined) => {
      await run({ ...program.opts<CommandOptions>(), root: directory });
    });

  return program;
}
