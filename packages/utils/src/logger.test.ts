import { describe, it, expect } from 'vitest';
import { createRootLogger } from './logger.js';

describe('createRootLogger', () => {
  function capture(level = 'info') {
    const lines: string[] = [];
    const log = createRootLogger({
      service: 'tiersync-test',
      level,
      env: 'test',
      destination: { write: (line: string) => { lines.push(line); } },
    });
    return { log, lines };
  }

  it('writes JSON lines with level labels and the service', () => {
    const { log, lines } = capture();

    log.info({ path: 'a.txt' }, 'Uploaded');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines.join(''));
    expect(entry).toMatchObject({
      level: 'info',
      service: 'tiersync-test',
      env: 'test',
      path: 'a.txt',
      msg: 'Uploaded',
    });
  });

  it('redacts renter credentials', () => {
    const { log, lines } = capture();

    log.info({ sia: { address: '127.0.0.1:9980', password: 'test-secret' } }, 'Connected');
    log.child({ component: 'renter' }).warn({ password: 'test-secret' }, 'Request failed');

    const entries: unknown[] = lines.map(line => JSON.parse(line));
    expect(entries[0]).toMatchObject({ sia: { address: '127.0.0.1:9980', password: '[redacted]' } });
    expect(entries[1]).toMatchObject({ component: 'renter', password: '[redacted]' });
  });

  it('drops lines below the level', () => {
    const { log, lines } = capture('warn');

    log.info('ignored');
    log.warn('kept');

    expect(lines).toHaveLength(1);
  });
});
