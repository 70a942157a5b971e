/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { PatternSource, Rule } from '../types';
import { restoreCase } from './casing';

const INLINE_CASE_FLAG = /^\(\?i\)/;
const TEMPLATE_GROUP = /\$(\d{1,2})/g;

/**
 * Build a case-insensitive, stateless RegExp from a pattern source.
 * Global and sticky flags are dropped so `exec` never depends on `lastIndex`.
 */
export function compilePattern(source: PatternSource): RegExp {
  if (source instanceof RegExp) {
    const flags = source.flags.replace(/[gyi]/g, '');
    return new RegExp(source.source, `${flags}i`);
  }

  const body = source.replace(INLINE_CASE_FLAG, '');
  try {
    return new RegExp(body, 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid rule pattern "${source}": ${reason}`);
  }
}

/**
 * Expand `$0`..`$99` in a replacement template from a match.
 * Groups that did not take part in the match expand to an empty string.
 */
export function interpolate(template: string, match: RegExpExecArray): string {
  return template.replace(TEMPLATE_GROUP, (_token: string, group: string) => match[Number(group)] ?? '');
}

/** True for words with at least one cased letter and no lower-case ones ("MP3", "R2D2"). */
function isShouted(word: string): boolean {
  return word === word.toUpperCase() && word !== word.toLowerCase();
}

/**
 * Apply `rule` to `word`, or return null when the pattern does not match.
 * Only the matched region is rewritten. An all-caps word gives an all-caps result;
 * otherwise the new text follows the case of the text it replaces.
 */
export function applyRule(word: string, rule: Rule): string | null {
  const match = rule.pattern.exec(word);
  if (!match) return null;

  const matched = match[0];
  const start = match.index;
  const result = interpolate(rule.replacement, match);

  // An empty match (e.g. `s?$` on "house") takes its case from the character before it
  const reference = matched !== '' ? matched : start > 0 ? word.charAt(start - 1) : word;

  const replaced = isShouted(word) ? result.toUpperCase() : restoreCase(reference, result);

  return word.slice(0, start) + replaced + word.slice(start + matched.length);
}
