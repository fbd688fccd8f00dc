/**
 * Sync Types
 */

export type Namespace = 'staging' | 'production';

export type ChecksumMode = 'size' | 'sha256';

export interface FileEntry {
  fingerprint: string;
  namespace: Namespace;
}
