import { describe, it, expect } from 'vitest';
import { applyCasing, detectCasing, restoreCase } from './casing';

describe('casing', () => {
  describe('detectCasing', () => {
    it('should classify the common styles', () => {
      expect(detectCasing('house')).toBe('lower');
      expect(detectCasing('HOUSE')).toBe('upper');
      expect(detectCasing('House')).toBe('capitalized');
      expect(detectCasing('iPhone')).toBe('mixed');
    });

    it('should treat caseless text as lower', () => {
      expect(detectCasing('')).toBe('lower');
      expect(detectCasing('42')).toBe('lower');
    });
  });

  describe('applyCasing', () => {
    it('should capitalize only the first character', () => {
      expect(applyCasing('capitalized', 'cHILDREN')).toBe('Children');
    });

    it('should lower-case for mixed references', () => {
      expect(applyCasing('mixed', 'IPHONES')).toBe('iphones');
    });
  });

  describe('restoreCase', () => {
    it('should follow the reference style', () => {
      expect(restoreCase('HOUSE', 'houses')).toBe('HOUSES');
      expect(restoreCase('House', 'houses')).toBe('Houses');
      expect(restoreCase('house', 'HOUSES')).toBe('houses');
    });

    it('should return an exact match untouched', () => {
      expect(restoreCase('feet', 'feet')).toBe('feet');
      expect(restoreCase('s', 's')).toBe('s');
    });
  });
});
