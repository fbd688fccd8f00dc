import { describe, it, expect } from 'vitest';
import { IgnoreRules } from './ignore.js';

describe('IgnoreRules', () => {
  it('skips hidden and partial names by default', () => {
    const rules = new IgnoreRules();

    expect(rules.matches('/srv/media/.DS_Store')).toBe(true);
    expect(rules.matches('/srv/media/movie.mkv.part')).toBe(true);
    expect(rules.matches('/srv/media/movie.mkv.!qB')).toBe(true);
    expect(rules.matches('/srv/media/notes.txt~')).toBe(true);
    expect(rules.matches('/srv/media/movie.mkv')).toBe(false);
  });

  it('only looks at the final name for hidden entries', () => {
    expect(new IgnoreRules().matches('/home/user/.config/media/movie.mkv')).toBe(false);
  });

  it('can keep hidden and partial names', () => {
    const rules = new IgnoreRules({ ignoreHidden: false, ignorePartials: false });

    expect(rules.matches('/srv/media/.hidden')).toBe(false);
    expect(rules.matches('/srv/media/movie.part')).toBe(false);
  });

  it('matches glob patterns against the name', () => {
    const rules = new IgnoreRules({ ignorePatterns: ['*.nfo', 'Thumbs.db', 'sample?.mkv'] });

    expect(rules.matches('/srv/media/movie.NFO')).toBe(true);
    expect(rules.matches('/srv/media/thumbs.db')).toBe(true);
    expect(rules.matches('/srv/media/sample1.mkv')).toBe(true);
    expect(rules.matches('/srv/media/sample10.mkv')).toBe(false);
  });
});
