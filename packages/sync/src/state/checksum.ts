/**
 * Checksum Provider
 *
 * Cheap content fingerprints for change detection. `size` is what the
 * renter reports back, so it can be compared against a remote listing
 * directly; it misses same-size edits. `sha256` catches every content change.
 */

import { IOError, type ChecksumMode } from '@tiersync/core';
import { calculateFileHash, getFileSizeBytes } from '@tiersync/utils';

export interface ChecksumProvider {
  readonly mode: ChecksumMode;

  fingerprint(absPath: string): Promise<string>;

  /**
   * Fingerprint the local file would have if it matched a remote object of
   * `remoteSize` bytes
   */
  baselineFromRemote(absPath: string, remoteSize: number): Promise<string>;
}

async function sizeOf(absPath: string): Promise<number> {
  try {
    return await getFileSizeBytes(absPath);
  } catch (error) {
    throw new IOError(absPath, 'stat', error);
  }
}

class SizeChecksum implements ChecksumProvider {
  readonly mode = 'size' as const;

  async fingerprint(absPath: string): Promise<string> {
    return String(await sizeOf(absPath));
  }

  async baselineFromRemote(_absPath: string, remoteSize: number): Promise<string> {
    return String(remoteSize);
  }
}

class Sha256Checksum implements ChecksumProvider {
  readonly mode = 'sha256' as const;

  async fingerprint(absPath: string): Promise<string> {
    try {
      return await calculateFileHash(absPath, 'sha256');
    } catch (error) {
      throw new IOError(absPath, 'hash', error);
    }
  }

  async baselineFromRemote(absPath: string, remoteSize: number): Promise<string> {
    if (await sizeOf(absPath) === remoteSize) {
      return this.fingerprint(absPath);
    }
    // Never equal to a hex digest
    return `remote-size:${remoteSize}`;
  }
}

export function createChecksumProvider(mode: ChecksumMode = 'size'): ChecksumProvider {
  switch (mode) {
    case 'size':
      return new SizeChecksum();
    case 'sha256':
      return new Sha256Checksum();
  }
}
