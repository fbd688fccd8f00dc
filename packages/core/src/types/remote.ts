/**
 * Remote Store Types
 *
 * The capability set the sync engine consumes from a replicated content store.
 * Remote paths are slash separated, without leading or trailing slash.
 */

export interface RedundancyConfig {
  dataPieces: number;
  parityPieces: number;
}

export interface RemoteFile {
  remotePath: string;
  size: number;
}

export interface DirectoryHealthEntry {
  remotePath: string;
  aggregateMinRedundancy: number;
}

export interface DirectoryHealth {
  // Index 0 is always the queried directory itself
  children: DirectoryHealthEntry[];
}

export interface RemoteCallOptions {
  signal?: AbortSignal;
}

export interface RemoteStore {
  uploadFile(
    localAbsPath: string,
    remotePath: string,
    redundancy: RedundancyConfig,
    options?: RemoteCallOptions
  ): Promise<void>;

  deleteFile(remotePath: string, options?: RemoteCallOptions): Promise<void>;

  /**
   * List files stored below any of the given prefixes
   */
  listFiles(prefixes: readonly string[], options?: RemoteCallOptions): Promise<RemoteFile[]>;

  getDirectoryHealth(remotePath: string, options?: RemoteCallOptions): Promise<DirectoryHealth>;

  renamePath(oldRemotePath: string, newRemotePath: string, options?: RemoteCallOptions): Promise<void>;

  fileExists(remotePath: string, options?: RemoteCallOptions): Promise<boolean>;

  /**
   * Reachability check, resolves with the store's version string
   */
  ping(options?: RemoteCallOptions): Promise<string>;
}
