import { describe, it, expect, afterEach } from 'vitest';
import {
  pluralize,
  toPlural,
  toSingular,
  isPlural,
  isSingular,
  explain,
  addPluralRule,
  addSingularRule,
  addIrregularRule,
  addUncountableRule,
  loadRuleSet,
  initialize,
  reset,
  createInflector
} from './index';

describe('pluralizer', () => {
  afterEach(() => {
    reset();
  });

  it('should convert based on the count', () => {
    expect(pluralize('House', 2, true)).toBe('2 Houses');
    expect(pluralize('Houses', 1, true)).toBe('1 House');
    expect(pluralize('House', 1, false)).toBe('House');
    expect(pluralize('Houses', 2, false)).toBe('Houses');
    expect(pluralize('House', 2)).toBe('Houses');
  });

  it('should convert directly in either direction', () => {
    expect(toPlural('person')).toBe('people');
    expect(toSingular('People')).toBe('Person');
    expect(toPlural('Child')).toBe('Children');
    expect(toSingular('MICE')).toBe('MOUSE');
  });

  it('should answer form checks', () => {
    expect(isPlural('children')).toBe(true);
    expect(isSingular('child')).toBe(true);
  });

  it('should expose the trace of a conversion', () => {
    expect(explain('Sheep', 'plural')).toMatchObject({ output: 'Sheep', source: 'rule' });
  });

  it('should apply registered rules to later calls', () => {
    initialize();
    addPluralRule(/(matr|cod|mur|sil|vert|ind|append)(?:ix|ex)$/i, '$1ices');
    addSingularRule(/(matr|append)ices$/i, '$1ix');
    addIrregularRule('I', 'we');
    addUncountableRule('cash');

    expect(pluralize('Vertex', 2)).toBe('Vertices');
    expect(pluralize('Matrices', 1)).toBe('Matrix');
    expect(pluralize('I', 2)).toBe('WE');
    expect(pluralize('Cash', 2)).toBe('Cash');
  });

  it('should register closed-compound irregulars', () => {
    addIrregularRule('quux', 'quuxen');
    expect(toPlural('bigquux')).toBe('bigquuxes');

    addIrregularRule('quux', 'quuxen', true);
    expect(toPlural('bigquux')).toBe('bigquuxen');
    expect(toSingular('Bigquuxen')).toBe('Bigquux');
  });

    it('should load rule sets into the shared tables', () => {
    loadRuleSet({ irregular: [{ singular: 'octopus', plural: 'octopodes' }] });
    expect(toPlural('octopus')).toBe('octopodes');
  });

  it('should forget registrations on reset', () => {
    addUncountableRule('dog');
    expect(toPlural('dog')).toBe('dog');
    reset();
    expect(toPlural('dog')).toBe('dogs');
  });

  it('should keep created inflectors separate from the shared one', () => {
    const strict = createInflector({ defaults: false });
    strict.addPluralRule('$', 'z');

    expect(strict.toPlural('dog')).toBe('dogz');
    expect(toPlural('dog')).toBe('dogs');
  });
});
