/**
 * Daemon Logger
 */

import { createRootLogger, type Logger } from '@tiersync/utils';
import type { DaemonConfig } from '../config/index.js';

export function createDaemonLogger(config: Pick<DaemonConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return createRootLogger({
    service: 'tiersync-daemon',
    level: config.logLevel,
    env: config.nodeEnv,
  });
}
