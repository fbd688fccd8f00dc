import { describe, it, expect } from 'vitest';
import { PathError } from '@tiersync/core';
import { NamespaceMapper } from './namespaceMapper.js';

const mapper = new NamespaceMapper({
  root: '/srv/media',
  stagingPrefix: '/fuse/staging/',
  productionPrefix: 'fuse/prod',
});

describe('NamespaceMapper', () => {
  it('normalizes the prefixes', () => {
    expect(mapper.stagingPrefix).toBe('fuse/staging');
    expect(mapper.prefix('production')).toBe('fuse/prod');
  });

  it('maps absolute and relative local paths to index keys', () => {
    expect(mapper.toRelative('/srv/media/sub/b.txt')).toBe('sub/b.txt');
    expect(mapper.toRelative('sub/./b.txt')).toBe('sub/b.txt');
    expect(mapper.toAbsolute('sub/b.txt')).toBe('/srv/media/sub/b.txt');
  });

  it('keeps backslashes in local names', () => {
    expect(mapper.toRelative('/srv/media/sub/a\\b.txt')).toBe('sub/a\\b.txt');
    expect(mapper.toAbsolute('sub/a\\b.txt')).toBe('/srv/media/sub/a\\b.txt');
    expect(mapper.toRemote('sub/a\\b.txt')).toBe('fuse/staging/sub/a\\b.txt');
  });

  it('rejects the root itself and paths outside it', () => {
    expect(() => mapper.toRelative('/srv/media')).toThrow('is the synchronized root itself');
    expect(() => mapper.toRelative('/srv/media-old/a.txt')).toThrow(PathError);
    expect(() => mapper.toRelative('../a.txt')).toThrow(PathError);
  });

  it('maps index keys into either namespace', () => {
    expect(mapper.toRemote('sub/b.txt')).toBe('fuse/staging/sub/b.txt');
    expect(mapper.toRemote('sub/b.txt', 'production')).toBe('fuse/prod/sub/b.txt');
  });

  it('reverses remote paths', () => {
    expect(mapper.fromRemote('fuse/prod/sub/b.txt')).toEqual({ namespace: 'production', relativePath: 'sub/b.txt' });
    expect(mapper.fromRemote('fuse/staging/a.txt')).toEqual({ namespace: 'staging', relativePath: 'a.txt' });
    expect(mapper.fromRemote('fuse/staging')).toBeNull();
    expect(mapper.fromRemote('fuse/stagingx/a.txt')).toBeNull();
  });

  it('rebases staging directories onto production', () => {
    expect(mapper.promotionTarget('fuse/staging/movies/Heat')).toBe('fuse/prod/movies/Heat');
    expect(() => mapper.promotionTarget('fuse/prod/movies/Heat')).toThrow(PathError);
  });

  it('refuses nested prefixes', () => {
    expect(() => new NamespaceMapper({
      root: '/srv/media',
      stagingPrefix: 'fuse',
      productionPrefix: 'fuse/prod',
    })).toThrow(PathError);
  });
});
