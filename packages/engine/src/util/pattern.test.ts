import { describe, it, expect } from 'vitest';
import { applyRule, compilePattern, interpolate } from './pattern';

function execOrFail(pattern: RegExp, word: string): RegExpExecArray {
  const match = pattern.exec(word);
  if (!match) throw new Error(`${pattern} did not match ${word}`);
  return match;
}

describe('pattern', () => {
  describe('compilePattern', () => {
    it('should strip an inline case flag', () => {
      const pattern = compilePattern('(?i)(ox)$');
      expect(pattern.source).toBe('(ox)$');
      expect(pattern.flags).toBe('i');
    });

    it('should drop stateful flags and force case-insensitivity', () => {
      expect(compilePattern(/ox$/g).flags).toBe('i');
      expect(compilePattern(/ox$/mu).flags).toBe('imu');
    });

    it('should name the pattern when it does not compile', () => {
      expect(() => compilePattern('(unclosed')).toThrow('Invalid rule pattern "(unclosed"');
    });
  });

  describe('interpolate', () => {
    it('should expand numbered groups', () => {
      const match = execOrFail(/(matr)ix$/i, 'matrix');
      expect(interpolate('$1ices', match)).toBe('matrices');
    });

    it('should expand groups that did not participate to nothing', () => {
      const match = execOrFail(/(?:(kni|wi|li)fe|(ar|l|ea|eo|oa|hoo)f)$/i, 'knife');
      expect(interpolate('$1$2ves', match)).toBe('knives');
    });

    it('should expand $0 to the whole match', () => {
      const match = execOrFail(/sheep$/i, 'blacksheep');
      expect(interpolate('$0', match)).toBe('sheep');
    });
  });

  describe('applyRule', () => {
    it('should take the case of an empty match from the preceding character', () => {
      const rule = { pattern: /s?$/i, replacement: 's' };
      expect(applyRule('house', rule)).toBe('houses');
      expect(applyRule('HOUSE', rule)).toBe('HOUSES');
      expect(applyRule('iPhone', rule)).toBe('iPhones');
    });

    it('should restore case against the matched region', () => {
      const rule = { pattern: /(x|ch|ss|sh|zz)$/i, replacement: '$1es' };
      expect(applyRule('Fox', rule)).toBe('Foxes');
      expect(applyRule('FOX', rule)).toBe('FOXES');
    });

    it('should upper-case the result for an all-caps word', () => {
      const rule = { pattern: /s?$/i, replacement: 's' };
      expect(applyRule('MP3', rule)).toBe('MP3S');
      expect(applyRule('R2D2', rule)).toBe('R2D2S');
      expect(applyRule('iPhone3', rule)).toBe('iPhone3s');
    });

    it('should return null when the pattern does not match', () => {
      expect(applyRule('cat', { pattern: /(matr)ix$/i, replacement: '$1ices' })).toBeNull();
    });
  });
});
