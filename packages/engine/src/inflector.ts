/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import { DEFAULT_RULE_SET, parseRuleSet, type RuleSetData } from '@pluralizer/rules';
import type {
  Direction,
  InflectionTrace,
  InflectorOptions,
  PatternSource,
  UncountableRule
} from './types';
import { PatternRuleTable } from './rules/patternRules';
import { IrregularTable } from './rules/irregular';
import { UncountableSet } from './rules/uncountable';
import { compilePattern } from './util/pattern';

// Replacement that keeps the matched text as-is
const KEEP = '$0';

// Replacement marker meaning "leave the word alone"
const NO_CHANGE = '';

function patternsOf(ruleSet: RuleSetData): string[] {
  return [
    ...(ruleSet.plural ?? []).map(([pattern]) => pattern),
    ...(ruleSet.singular ?? []).map(([pattern]) => pattern),
    ...(ruleSet.uncountablePatterns ?? [])
  ];
}

/** Validate `data` and compile every pattern, so registering it cannot fail halfway. */
function checkRuleSet(data: unknown, source?: string): RuleSetData {
  const ruleSet = parseRuleSet(data, source);
  for (const pattern of patternsOf(ruleSet)) {
    compilePattern(pattern);
  }
  return ruleSet;
}

/**
 * Owns the plural rules, singular rules, irregular table and uncountable set.
 *
 * Tables are filled from the default rule set on first use. Every `add*` call
 * initializes first, so user entries always land after (and win over) the defaults.
 */
export class Inflector {
  private readonly pluralRules = new PatternRuleTable();
  private readonly singularRules = new PatternRuleTable();
  private readonly irregulars = new IrregularTable();
  private readonly uncountables = new UncountableSet();
  private readonly defaults: RuleSetData | null;
  private readonly debug: boolean;
  private initialized = false;

  /** Throws when custom `defaults` are malformed or hold a pattern that does not compile. */
  constructor(options: InflectorOptions = {}) {
    if (options.defaults === false) {
      this.defaults = null;
    } else if (options.defaults === undefined) {
      this.defaults = DEFAULT_RULE_SET;
    } else {
      this.defaults = checkRuleSet(options.defaults, 'defaults');
    }
    this.debug = options.debug ?? false;
  }

  /** Populate the tables from the default rule set. Runs once per instance. */
  initialize(): void {
    if (this.initialized) return;
    this.initialized = true;
    if (this.defaults) {
      this.register(this.defaults);
    }
  }

  /** Drop every registered entry and re-apply the defaults. */
  reset(): void {
    this.pluralRules.clear();
    this.singularRules.clear();
    this.irregulars.clear();
    this.uncountables.clear();
    this.initialized = false;
    this.initialize();
  }

  /**
   * Validate and register a rule set on top of what is already loaded.
   * Sections are applied as irregulars, plural rules, singular rules, then uncountables.
   */
  loadRuleSet(data: unknown, source?: string): void {
    const ruleSet = checkRuleSet(data, source);
    this.initialize();
    this.register(ruleSet);
  }

  addPluralRule(pattern: PatternSource, replacement: string): void {
    this.initialize();
    this.pluralRules.add(pattern, replacement);
  }

  addSingularRule(pattern: PatternSource, replacement: string): void {
    this.initialize();
    this.singularRules.add(pattern, replacement);
  }

  addIrregularRule(singular: string, plural: string, compound = false): void {
    this.initialize();
    this.irregulars.add(singular, plural, compound);
  }

  /** A word joins the uncountable set; a RegExp becomes a keep-rule in both directions. */
  addUncountableRule(rule: UncountableRule): void {
    this.initialize();
    this.addUncountable(rule);
  }

  toPlural(word: string): string {
    return this.transform(word, 'plural');
  }

  toSingular(word: string): string {
    return this.transform(word, 'singular');
  }

  /** Singular for a count of exactly 1, plural otherwise; `inclusive` prefixes the count. */
  pluralize(word: string, count: number, inclusive = false): string {
    const inflected = count === 1 ? this.toSingular(word) : this.toPlural(word);
    return inclusive ? `${count} ${inflected}` : inflected;
  }

  isPlural(word: string): boolean {
    return this.check(word, 'plural');
  }

  isSingular(word: string): boolean {
    return this.check(word, 'singular');
  }

  transform(word: string, direction: Direction): string {
    return this.explain(word, direction).output;
  }

  /** Resolve `word` and report which table produced the result. */
  explain(word: string, direction: Direction): InflectionTrace {
    this.initialize();
    const trace = this.resolve(word, direction);
    if (this.debug) {
      console.log(`[Inflector] ${direction} "${trace.input}" -> "${trace.output}" via ${trace.source}`);
    }
    return trace;
  }

  private resolve(word: string, direction: Direction): InflectionTrace {
    if (word.length === 0) {
      return { input: word, output: word, direction, source: 'empty' };
    }

    if (this.uncountables.has(word)) {
      return { input: word, output: word, direction, source: 'uncountable' };
    }

    const irregular = this.irregulars.lookup(word, direction);
    if (irregular) {
      return {
        input: word,
        output: irregular.output,
        direction,
        source: 'irregular',
        irregular: {
          singular: irregular.entry.singular,
          plural: irregular.entry.plural,
          kind: irregular.kind
        }
      };
    }

    const match = this.rules(direction).match(word);
    if (!match) {
      return { input: word, output: word, direction, source: 'identity' };
    }

    const { rule, index } = match;
    return {
      input: word,
      output: rule.replacement === NO_CHANGE ? word : match.output,
      direction,
      source: 'rule',
      rule: { pattern: rule.pattern.source, replacement: rule.replacement, index }
    };
  }

  private check(word: string, direction: Direction): boolean {
    this.initialize();
    const token = word.toLowerCase();
    if (token.length === 0 || this.uncountables.has(token)) return true;

    const irregular = this.irregulars.lookup(token, direction);
    if (irregular) return irregular.kind === 'keep';

    const match = this.rules(direction).match(token);
    if (!match || match.rule.replacement === NO_CHANGE) return true;
    return match.output === token;
  }

  private rules(direction: Direction): PatternRuleTable {
    return direction === 'plural' ? this.pluralRules : this.singularRules;
  }

  private addUncountable(rule: UncountableRule): void {
    if (rule instanceof RegExp) {
      this.addKeepRule(rule);
    } else {
      this.uncountables.add(rule);
    }
  }

  private addKeepRule(pattern: PatternSource): void {
    this.pluralRules.add(pattern, KEEP);
    this.singularRules.add(pattern, KEEP);
  }

  private register(ruleSet: RuleSetData): void {
    for (const { singular, plural, compound } of ruleSet.irregular ?? []) {
      this.irregulars.add(singular, plural, compound ?? false);
    }
    for (const [pattern, replacement] of ruleSet.plural ?? []) {
      this.pluralRules.add(pattern, replacement);
    }
    for (const [pattern, replacement] of ruleSet.singular ?? []) {
      this.singularRules.add(pattern, replacement);
    }
    for (const word of ruleSet.uncountable ?? []) {
      this.uncountables.add(word);
    }
    for (const pattern of ruleSet.uncountablePatterns ?? []) {
      this.addKeepRule(pattern);
    }
  }
}
