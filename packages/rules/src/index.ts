/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import defaultRules from '../data/default-rules.json';
import { parseRuleSet, type RuleSetData } from './ruleSet';

export {
  parseRuleSet,
  validateRuleSet,
  RULE_SET_SCHEMA,
  type RulePair,
  type IrregularPair,
  type RuleSetData,
  type RuleSetValidation
} from './ruleSet';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

// Built-in English tables: common suffix patterns plus a curated irregular list.
// Frozen, since every inflector and every reset() reads the same object.
export const DEFAULT_RULE_SET: RuleSetData = deepFreeze(parseRuleSet(defaultRules, 'default rule set'));

// Helper: Lower-cased default uncountable words
export function getDefaultUncountables(): Set<string> {
  return new Set((DEFAULT_RULE_SET.uncountable ?? []).map((word) => word.toLowerCase()));
}

// Helper: Default irregular pairs keyed by lower-cased singular
export function getDefaultIrregulars(): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const { singular, plural } of DEFAULT_RULE_SET.irregular ?? []) {
    pairs.set(singular.toLowerCase(), plural.toLowerCase());
  }
  return pairs;
}
