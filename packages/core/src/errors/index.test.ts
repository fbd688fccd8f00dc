import { describe, it, expect } from 'vitest';
import { ConfigError, IOError, RaceError, RemoteError, ShutdownError, TierSyncError, formatError } from './index.js';

describe('errors', () => {
  it('IOError keeps the failing path, operation and cause', () => {
    const cause = new Error('ENOENT: no such file');
    const error = new IOError('/data/a.txt', 'stat', cause);

    expect(error).toBeInstanceOf(TierSyncError);
    expect(error.name).toBe('IOError');
    expect(error.code).toBe('IO_ERROR');
    expect(error.message).toBe('Failed to stat /data/a.txt: ENOENT: no such file');
    expect(error.details).toEqual({ path: '/data/a.txt', operation: 'stat' });
    expect(error.cause).toBe(cause);
  });

  it('RemoteError exposes the status code', () => {
    const error = new RemoteError('no file known', '/renter/file/fuse/staging/a.txt', 400);

    expect(error.statusCode).toBe(400);
    expect(error.details).toEqual({ endpoint: '/renter/file/fuse/staging/a.txt', statusCode: 400 });
  });

  it('RaceError names the path that could not be recreated', () => {
    const error = new RaceError('movies/a.mkv', new Error('upload refused'));

    expect(error.message).toBe('Create of movies/a.mkv failed after retry: upload refused');
  });

  it('ConfigError lists every issue on its own line', () => {
    const error = new ConfigError('Invalid configuration', ['root: Required', 'threshold: must be >= 0']);

    expect(error.message).toBe('Invalid configuration\n  - root: Required\n  - threshold: must be >= 0');
    expect(error.details).toEqual({ issues: ['root: Required', 'threshold: must be >= 0'] });
  });

  it('ShutdownError names the refused call', () => {
    const error = new ShutdownError('upload', 'fuse/staging/a.txt');

    expect(error.code).toBe('SHUTDOWN');
    expect(error.message).toBe('Not starting upload of fuse/staging/a.txt: sync folder is closing');
  });

  it('formatError prefixes tiersync errors with their code', () => {
    expect(formatError(new ConfigError('bad root'))).toBe('[CONFIG_ERROR] bad root');
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError('text')).toBe('text');
  });
});
