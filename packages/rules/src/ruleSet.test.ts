import { describe, it, expect } from 'vitest';
import { parseRuleSet, validateRuleSet } from './ruleSet';
import { DEFAULT_RULE_SET, getDefaultIrregulars, getDefaultUncountables } from './index';

describe('rule sets', () => {
  describe('validateRuleSet', () => {
    it('should accept a complete rule set', () => {
      const result = validateRuleSet({
        irregular: [{ singular: 'foot', plural: 'feet', compound: true }],
        plural: [['(quiz)$', '$1zes']],
        singular: [['(quiz)zes$', '$1']],
        uncountable: ['sheep'],
        uncountablePatterns: ['fish$']
      });

      expect(result.valid).toBe(true);
    });

    it('should accept an empty rule set', () => {
      expect(validateRuleSet({}).valid).toBe(true);
    });

    it('should reject rule pairs with the wrong arity', () => {
      const result = validateRuleSet({ plural: [['(ox)$']] });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors).toContain('/plural/0 must NOT have fewer than 2 items');
      }
    });

    it('should reject irregular entries without a plural', () => {
      const result = validateRuleSet({ irregular: [{ singular: 'ox' }] });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors).toContain("/irregular/0 must have required property 'plural'");
      }
    });

    it('should reject unknown sections', () => {
      const result = validateRuleSet({ plurals: [] });

      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.errors).toEqual(['/ must NOT have additional properties']);
      }
    });
  });

  describe('parseRuleSet', () => {
    it('should return the data typed when valid', () => {
      const data = { uncountable: ['rice'] };
      expect(parseRuleSet(data)).toBe(data);
    });

    it('should throw with the source name and every violation', () => {
      expect(() => parseRuleSet({ uncountable: [1] }, 'custom.json')).toThrow(
        'Invalid custom.json: /uncountable/0 must be string'
      );
    });
  });

  describe('defaults', () => {
    it('should ship every section', () => {
      expect(DEFAULT_RULE_SET.plural?.length).toBeGreaterThan(20);
      expect(DEFAULT_RULE_SET.singular?.length).toBeGreaterThan(20);
      expect(DEFAULT_RULE_SET.uncountablePatterns).toContain('sheep$');
    });

    it('should not allow the shared defaults to be changed', () => {
      expect(Object.isFrozen(DEFAULT_RULE_SET)).toBe(true);
      expect(() => DEFAULT_RULE_SET.uncountable?.push('cat')).toThrow(TypeError);
      expect(() => {
        const [first] = DEFAULT_RULE_SET.plural ?? [];
        if (first) first[1] = 'z';
      }).toThrow(TypeError);
      expect(DEFAULT_RULE_SET.uncountable).not.toContain('cat');
    });

        it('should expose lower-cased uncountables', () => {
      const uncountables = getDefaultUncountables();
      expect(uncountables.has('news')).toBe(true);
      expect(uncountables.has('house')).toBe(false);
    });

    it('should key irregulars by lower-cased singular', () => {
      const irregulars = getDefaultIrregulars();
      expect(irregulars.get('i')).toBe('we');
      expect(irregulars.get('tooth')).toBe('teeth');
    });
  });
});
