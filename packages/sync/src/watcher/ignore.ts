/**
 * Ignore Rules
 *
 * Names skipped by both the startup walk and the live watcher.
 */

import { basename } from 'node:path';

export interface IgnoreConfig {
  // Ignore hidden files/directories
  ignoreHidden?: boolean;

  // Ignore partial download files
  ignorePartials?: boolean;

  // Patterns to ignore (glob-like, matched against the name and the full path)
  ignorePatterns?: string[];
}

export class IgnoreRules {
  private readonly config: Required<IgnoreConfig>;
  private readonly patterns: RegExp[];

  // Common partial download patterns
  private static readonly PARTIAL_PATTERNS = [
    /\.part$/i,
    /\.partial$/i,
    /\.crdownload$/i,
    /\.download$/i,
    /\.tmp$/i,
    /\.temp$/i,
    /~$/,
    /\.!qB$/i,      // qBittorrent
    /\.!ut$/i,      // uTorrent
    /\.bc!$/i,      // BitComet
    /\.aria2$/i,    // aria2
  ];

  constructor(config: IgnoreConfig = {}) {
    this.config = {
      ignoreHidden: config.ignoreHidden ?? true,
      ignorePartials: config.ignorePartials ?? true,
      ignorePatterns: config.ignorePatterns ?? [],
    };
    this.patterns = this.config.ignorePatterns.map(toRegExp);
  }

  matches(fullPath: string): boolean {
    const name = basename(fullPath);

    if (this.config.ignoreHidden && name.startsWith('.')) {
      return true;
    }

    if (this.config.ignorePartials && IgnoreRules.PARTIAL_PATTERNS.some(p => p.test(name))) {
      return true;
    }

    return this.patterns.some(p => p.test(name) || p.test(fullPath));
  }
}

function toRegExp(pattern: string): RegExp {
  // Simple glob matching
  return new RegExp(
    '^' + pattern
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*')
      .replace(/\?/g, '.') + '$',
    'i'
  );
}
