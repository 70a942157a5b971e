/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { PatternSource, UncountableRule } from '@pluralizer/engine';
import { defaultInflector } from './defaultInflector';

/**
 * Add a pluralization rule. Rules added later win over earlier ones.
 *
 * @example
 * addPluralRule(/(matr|cod|mur|sil|vert|ind|append)(?:ix|ex)$/i, '$1ices');
 * pluralize('Vertex', 2); // "Vertices"
 */
export function addPluralRule(pattern: PatternSource, replacement: string): void {
  defaultInflector.addPluralRule(pattern, replacement);
}

/**
 * Add a singularization rule.
 *
 * @example
 * addSingularRule(/(matr|append)ices$/i, '$1ix');
 * pluralize('Matrices', 1); // "Matrix"
 */
export function addSingularRule(pattern: PatternSource, replacement: string): void {
  defaultInflector.addSingularRule(pattern, replacement);
}

/**
 * Add an irregular word definition, used in both directions.
 * With `compound`, it also applies at the end of closed compounds.
 *
 * @example
 * addIrregularRule('I', 'we');
 * pluralize('I', 2); // "WE"
 */
export function addIrregularRule(singular: string, plural: string, compound = false): void {
  defaultInflector.addIrregularRule(singular, plural, compound);
}

/**
 * Add an uncountable word, or a pattern every matching word is left alone for.
 *
 * @example
 * addUncountableRule('cash');
 * pluralize('Cash', 2); // "Cash"
 */
export function addUncountableRule(rule: UncountableRule): void {
  defaultInflector.addUncountableRule(rule);
}

/** Validate and register a JSON rule set on top of the current tables. */
export function loadRuleSet(data: unknown, source?: string): void {
  defaultInflector.loadRuleSet(data, source);
}
