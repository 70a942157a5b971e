/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { Direction, InflectionTrace } from '@pluralizer/engine';
import { defaultInflector } from './defaultInflector';

/**
 * Pluralize or singularize a word based on the passed in count.
 *
 * - A count of exactly 1 gives the singular form, any other count the plural
 * - Words already in the target form are kept as they are
 * - The capitalization of `word` carries over to the result
 *
 * @param inclusive - Prefix the result with the count and a space
 *
 * @example
 * pluralize('House', 2, true); // "2 Houses"
 * pluralize('Houses', 1, true); // "1 House"
 * pluralize('House', 1, false); // "House"
 * pluralize('Houses', 2, false); // "Houses"
 */
export function pluralize(word: string, count: number, inclusive = false): string {
  return defaultInflector.pluralize(word, count, inclusive);
}

export function toPlural(word: string): string {
  return defaultInflector.toPlural(word);
}

export function toSingular(word: string): string {
  return defaultInflector.toSingular(word);
}

export function isPlural(word: string): boolean {
  return defaultInflector.isPlural(word);
}

export function isSingular(word: string): boolean {
  return defaultInflector.isSingular(word);
}

/** Show which table (uncountable, irregular, rule) decides the form of `word`. */
export function explain(word: string, direction: Direction): InflectionTrace {
  return defaultInflector.explain(word, direction);
}
