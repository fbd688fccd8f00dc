import { describe, it, expect, afterEach, vi } from 'vitest';
import { rm, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from '@tiersync/core';
import { sleep } from '@tiersync/utils';
import { SyncFolder, type SyncFolderOptions } from './syncFolder.js';
import { MemoryRemoteStore } from './testing/memoryRemoteStore.js';
import { FakeWatcher } from './testing/fakeWatcher.js';
import { createTree, writeTreeFile } from './testing/harness.js';

describe('SyncFolder', () => {
  const roots: string[] = [];
  const folders: SyncFolder[] = [];

  async function open(root: string, overrides: Partial<SyncFolderOptions> = {}) {
    const store = new MemoryRemoteStore();
    const watcher = new FakeWatcher();
    const folder = await SyncFolder.open({
      root,
      store,
      watcher,
      stagingPrefix: 'staging',
      productionPrefix: 'production',
      categories: ['.'],
      promotionIntervalMs: 60_000,
      createRetryDelayMs: 0,
      ...overrides,
    });
    folders.push(folder);
    return { folder, store, watcher };
  }

  async function tree(files: Record<string, string>): Promise<string> {
    const root = await createTree(files);
    roots.push(root);
    return root;
  }

  function trace(calls: Array<{ op: string; path: string; target?: string }>): string[] {
    return calls.map(call => `${call.op} ${call.path}${call.target ? ` -> ${call.target}` : ''}`);
  }

  afterEach(async () => {
    await Promise.all(folders.splice(0).map(folder => folder.close()));
    await Promise.all(roots.splice(0).map(root => rm(root, { recursive: true, force: true })));
  });

  it('uploads, replaces and promotes a small tree', async () => {
    const root = await tree({ 'a.txt': '0123456789', 'sub/b.txt': 'hello' });
    const { folder, store, watcher } = await open(root, { archive: false });

    expect(store.callsOf('upload').sort()).toEqual(['staging/a.txt', 'staging/sub/b.txt']);
    expect(folder.reconciled).toMatchObject({ files: 2, directories: 1, uploaded: 2, reuploaded: 0 });

    store.calls.length = 0;
    watcher.emit('write', await writeTreeFile(root, 'a.txt', '01234567890123456789'));
    await folder.idle();
    expect(trace(store.calls)).toEqual(['delete staging/a.txt', 'upload staging/a.txt']);

    store.calls.length = 0;
    store.setHealth('staging', { 'staging/sub': 1.5 });
    await folder.scheduler.tick();
    expect(trace(store.calls)).toEqual(['health staging', 'rename staging/sub -> production/sub']);
    expect(folder.index.getFile('sub/b.txt')?.namespace).toBe('production');

    store.calls.length = 0;
    await unlink(join(root, 'sub', 'b.txt'));
    watcher.emit('remove', join(root, 'sub', 'b.txt'));
    await folder.idle();
    expect(trace(store.calls)).toEqual(['delete production/sub/b.txt']);
    expect([...store.files.keys()]).toEqual(['staging/a.txt']);
  });

  it('keeps superseded objects by default', async () => {
    const root = await tree({ 'a.txt': '0123456789' });
    const { folder, store, watcher } = await open(root);

    store.calls.length = 0;
    watcher.emit('write', await writeTreeFile(root, 'a.txt', '0123'));
    await folder.idle();

    expect(trace(store.calls)).toEqual(['upload staging/a.txt']);
    expect(folder.stats).toEqual({ uploaded: 2, deleted: 0 });
  });

  it('rejects a missing root', async () => {
    const root = await tree({});

    await expect(open(join(root, 'missing'))).rejects.toThrow(ConfigError);
  });

  it('rejects a root that is a file', async () => {
    const root = await tree({ 'a.txt': 'x' });

    await expect(open(join(root, 'a.txt'))).rejects.toThrow('is not a directory');
  });

  it('stops the watcher when reconciliation fails', async () => {
    const root = await tree({ 'a.txt': 'x' });
    const store = new MemoryRemoteStore();
    const watcher = new FakeWatcher();
    store.failNext('list');

    await expect(SyncFolder.open({
      root,
      store,
      watcher,
      stagingPrefix: 'staging',
      productionPrefix: 'production',
    })).rejects.toThrow('list failed');
    expect(watcher.stopped).toBe(true);
    expect(watcher.listenerCount).toBe(0);
  });

  it('starts no remote call after close while an upload is in flight', async () => {
    const root = await tree({ 'a.txt': '0123456789' });
    const { folder, store, watcher } = await open(root, { archive: false, promotionIntervalMs: 20 });
    const release = store.holdNext('upload');

    watcher.emit('create', await writeTreeFile(root, 'new.txt', 'abc'));
    await vi.waitFor(() => expect(store.callsOf('upload')).toContain('staging/new.txt'));
    await unlink(join(root, 'a.txt'));
    watcher.emit('remove', join(root, 'a.txt'));

    const closing = folder.close();
    const started = store.calls.length;
    await sleep(100);
    release();
    await closing;

    expect(store.calls.slice(started)).toEqual([]);
    expect(folder.index.getFile('new.txt')).toEqual({ fingerprint: '3', namespace: 'staging' });
    expect(folder.index.getFile('a.txt')).toBeDefined();
  });

  it('closes once and stops the watcher', async () => {
    const root = await tree({});
    const { folder, watcher } = await open(root);

    await Promise.all([folder.close(), folder.close({ abort: true })]);

    expect(watcher.stopped).toBe(true);
    expect(folder.scheduler.running).toBe(false);
    expect(watcher.listenerCount).toBe(0);
  });
});
