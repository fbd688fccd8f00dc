/**
 * @tiersync/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Remote store contract
 * - Shared sync types
 */

// Errors
export {
  TierSyncError,
  IOError,
  RemoteError,
  RaceError,
  ConfigError,
  PathError,
  ShutdownError,
  formatError,
} from './errors/index.js';

// Types
export type {
  RedundancyConfig,
  RemoteFile,
  DirectoryHealth,
  DirectoryHealthEntry,
  RemoteCallOptions,
  RemoteStore,
} from './types/remote.js';

export type {
  Namespace,
  ChecksumMode,
  FileEntry,
} from './types/sync.js';
