import { describe, it, expect, afterEach } from 'vitest';
import { rm, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { createHarness, createTree, writeTreeFile, type HarnessOptions } from '../testing/harness.js';

describe('EventDispatcher', () => {
  const roots: string[] = [];

  async function setup(options: HarnessOptions = {}) {
    const root = await createTree({ 'a.txt': '0123456789', 'sub/b.txt': 'hello' });
    roots.push(root);

    const harness = createHarness(root, options);
    harness.dispatcher.attach();
    await harness.reconciler.reconcile();
    harness.store.calls.length = 0;

    return { root, ...harness };
  }

  function trace(calls: Array<{ op: string; path: string }>): string[] {
    return calls.map(call => `${call.op} ${call.path}`);
  }

  afterEach(async () => {
    await Promise.all(roots.splice(0).map(root => rm(root, { recursive: true, force: true })));
  });

  it('buffers events until started', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    const file = await writeTreeFile(root, 'new.txt', 'abc');

    watcher.emit('create', file);
    expect(dispatcher.queued).toBe(1);
    await Promise.resolve();
    expect(store.calls).toEqual([]);

    dispatcher.start();
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['upload fuse/staging/new.txt']);
    expect(dispatcher.queued).toBe(0);
  });

  it('uploads new files once', async () => {
    const { root, index, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('create', await writeTreeFile(root, 'sub/c.txt', 'abc'));
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['upload fuse/staging/sub/c.txt']);
    expect(index.getFile('sub/c.txt')).toEqual({ fingerprint: '3', namespace: 'staging' });
  });

  it('registers new directories and picks up files already inside', async () => {
    const { root, index, store, watcher, dispatcher } = await setup();
    dispatcher.start();
    await writeTreeFile(root, 'movies/Heat/heat.mkv', 'video');

    watcher.emit('create', join(root, 'movies'));
    await dispatcher.idle();

    expect(index.hasDir('movies')).toBe(true);
    expect(index.hasDir('movies/Heat')).toBe(true);
    expect(watcher.paths.has(join(root, 'movies', 'Heat'))).toBe(true);
    expect(trace(store.calls)).toEqual(['upload fuse/staging/movies/Heat/heat.mkv']);
  });

  it('replaces changed files on write', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('write', await writeTreeFile(root, 'a.txt', '01234567890123456789'));
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['delete fuse/staging/a.txt', 'upload fuse/staging/a.txt']);
    expect(store.files.get('fuse/staging/a.txt')).toBe(20);
  });

  it('treats a create on a known path as a write', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('create', join(root, 'a.txt'));
    await dispatcher.idle();
    expect(store.calls).toEqual([]);

    watcher.emit('create', await writeTreeFile(root, 'a.txt', 'short'));
    await dispatcher.idle();
    expect(trace(store.calls)).toEqual(['delete fuse/staging/a.txt', 'upload fuse/staging/a.txt']);
  });

  it('ignores writes to unindexed files', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('write', await writeTreeFile(root, 'stray.txt', 'abc'));
    await dispatcher.idle();

    expect(store.calls).toEqual([]);
  });

  it('deletes removed files and ignores unknown paths', async () => {
    const { root, index, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    await unlink(join(root, 'a.txt'));
    watcher.emit('remove', join(root, 'a.txt'));
    watcher.emit('remove', join(root, 'never-seen.txt'));
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['delete fuse/staging/a.txt']);
    expect(index.getFile('a.txt')).toBeUndefined();
  });

  it('prunes removed directories', async () => {
    const { root, index, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    await rm(join(root, 'sub'), { recursive: true });
    watcher.emit('remove', join(root, 'sub'));
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['delete fuse/staging/sub/b.txt']);
    expect(index.hasDir('sub')).toBe(false);
    expect(index.filePaths()).toEqual(['a.txt']);
    expect([...watcher.paths]).toEqual([root]);
  });

  it('drops events for paths that vanished', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('create', join(root, 'gone.txt'));
    watcher.emit('write', join(root, 'gone.txt'));
    await dispatcher.idle();

    expect(store.calls).toEqual([]);
  });

  it('keeps going after a failed event', async () => {
    const { root, index, store, watcher, dispatcher } = await setup();
    dispatcher.start();
    store.failNext('delete');

    watcher.emit('remove', join(root, 'a.txt'));
    watcher.emit('create', await writeTreeFile(root, 'next.txt', 'abc'));
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual(['delete fuse/staging/a.txt', 'upload fuse/staging/next.txt']);
    expect(index.getFile('a.txt')).toBeDefined();
    expect(index.getFile('next.txt')).toBeDefined();
  });

  it('handles events in arrival order', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();
    const first = await writeTreeFile(root, 'first.txt', '1');
    const second = await writeTreeFile(root, 'second.txt', '2');

    watcher.emit('create', second);
    watcher.emit('create', first);
    watcher.emit('remove', second);
    await dispatcher.idle();

    expect(trace(store.calls)).toEqual([
      'upload fuse/staging/second.txt',
      'upload fuse/staging/first.txt',
      'delete fuse/staging/second.txt',
    ]);
  });

  it('ignores events outside the root', async () => {
    const { root, store, watcher, dispatcher } = await setup();
    dispatcher.start();

    watcher.emit('create', join(root, '..', 'elsewhere.txt'));
    watcher.emit('remove', root);
    await dispatcher.idle();

    expect(store.calls).toEqual([]);
  });

  it('drops queued events on stop', async () => {
    const { root, store, watcher, dispatcher } = await setup();

    watcher.emit('create', await writeTreeFile(root, 'late.txt', 'abc'));
    await dispatcher.stop();

    expect(store.calls).toEqual([]);
    expect(watcher.listenerCount).toBe(0);

    watcher.emit('create', join(root, 'late.txt'));
    await dispatcher.idle();
    expect(store.calls).toEqual([]);
  });
});
