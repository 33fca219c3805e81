import { describe, it, expect } from 'vitest';
import { resolveIdentity, stripSuffix } from '../../src/extensions/identity.js';

const ROOT = '/srv/bot/plugins';
const OPTIONS = { rootName: 'pkg', suffix: '.ts' };

function nameOf(path: string): string | null {
  const result = resolveIdentity(ROOT, path, OPTIONS);
  return result.kind === 'ok' ? result.identity.name : null;
}

describe('stripSuffix', () => {
  it('should strip only the final suffix', () => {
    expect(stripSuffix('a.test.ts', '.ts')).toBe('a.test');
    expect(stripSuffix('a.ts', '.ts')).toBe('a');
  });

  it('should return null when the suffix is not at the end', () => {
    expect(stripSuffix('a.ts.bak', '.ts')).toBeNull();
    expect(stripSuffix('a.js', '.ts')).toBeNull();
  });
});

describe('resolveIdentity', () => {
  describe('qualified names', () => {
    it('should prefix the root name to a top-level file', () => {
      expect(resolveIdentity(ROOT, `${ROOT}/dice.ts`, OPTIONS)).toEqual({
        kind: 'ok',
        identity: { name: 'pkg.dice', path: `${ROOT}/dice.ts`, relativePath: 'dice.ts' },
      });
    });

    it('should join nested directories with dots', () => {
      expect(resolveIdentity(ROOT, `${ROOT}/games/cards/poker.ts`, OPTIONS)).toEqual({
        kind: 'ok',
        identity: {
          name: 'pkg.games.cards.poker',
          path: `${ROOT}/games/cards/poker.ts`,
          relativePath: 'games/cards/poker.ts',
        },
      });
    });

    it('should accept paths relative to the root', () => {
      const result = resolveIdentity(ROOT, 'games/dice.ts', OPTIONS);
      expect(result).toEqual({
        kind: 'ok',
        identity: { name: 'pkg.games.dice', path: `${ROOT}/games/dice.ts`, relativePath: 'games/dice.ts' },
      });
    });

    it('should keep underscores and hyphens inside names', () => {
      expect(nameOf('my_ext.ts')).toBe('pkg.my_ext');
      expect(nameOf('health-check.ts')).toBe('pkg.health-check');
    });

    it('should use the configured suffix', () => {
      const result = resolveIdentity(ROOT, 'dice.js', { rootName: 'bot.builtin', suffix: '.js' });
      expect(result.kind === 'ok' && result.identity.name).toBe('bot.builtin.dice');
    });
  });

  describe('private names', () => {
    it('should mark a file starting with an underscore as private', () => {
      expect(resolveIdentity(ROOT, '_b.ts', OPTIONS)).toEqual({ kind: 'private', name: 'pkg._b' });
    });

    it('should mark files under a private directory as private', () => {
      expect(resolveIdentity(ROOT, '_helpers/format.ts', OPTIONS)).toEqual({
        kind: 'private',
        name: 'pkg._helpers.format',
      });
      expect(resolveIdentity(ROOT, 'games/_shared/deck.ts', OPTIONS)).toEqual({
        kind: 'private',
        name: 'pkg.games._shared.deck',
      });
    });
  });

  describe('invalid paths', () => {
    it('should reject files without the suffix', () => {
      expect(resolveIdentity(ROOT, 'a.ts.bak', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: 'file does not end with .ts',
      });
    });

    it('should reject a stem left empty by the suffix', () => {
      expect(resolveIdentity(ROOT, '.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: '"" is not a valid name segment',
      });
    });

    it('should reject stems containing the separator', () => {
      expect(resolveIdentity(ROOT, 'types.d.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: '"types.d" is not a valid name segment',
      });
      expect(resolveIdentity(ROOT, 'a.py.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: '"a.py" is not a valid name segment',
      });
    });

    it('should reject directories containing the separator', () => {
      expect(resolveIdentity(ROOT, 'v1.2/a.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: '"v1.2" is not a valid name segment',
      });
    });

    it('should reject paths outside the root', () => {
      expect(resolveIdentity(ROOT, '/srv/bot/other/a.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: 'path is not inside the root',
      });
      expect(resolveIdentity(ROOT, '../a.ts', OPTIONS)).toEqual({
        kind: 'invalid',
        reason: 'path is not inside the root',
      });
    });

    it('should reject the root itself', () => {
      expect(resolveIdentity(ROOT, ROOT, OPTIONS)).toEqual({
        kind: 'invalid',
        reason: 'path is not inside the root',
      });
    });
  });

  describe('purity', () => {
    it('should return equal results for the same path', () => {
      expect(resolveIdentity(ROOT, 'games/dice.ts', OPTIONS)).toEqual(resolveIdentity(ROOT, 'games/dice.ts', OPTIONS));
    });

    it('should give distinct names to distinct paths', () => {
      const paths = ['a.ts', 'a/b.ts', 'a/b/c.ts', 'ab.ts', 'a_b.ts', 'b/a.ts', 'a-b.ts'];
      const names = paths.map(nameOf);
      expect(names).not.toContain(null);
      expect(new Set(names).size).toBe(paths.length);
    });
  });
});
