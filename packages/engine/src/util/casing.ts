/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { Casing } from '../types';

export function detectCasing(word: string): Casing {
  if (word === word.toLowerCase()) return 'lower';
  if (word === word.toUpperCase()) return 'upper';
  const first = word.charAt(0);
  if (first === first.toUpperCase()) return 'capitalized';
  return 'mixed';
}

export function applyCasing(casing: Casing, token: string): string {
  switch (casing) {
    case 'lower':
      return token.toLowerCase();
    case 'upper':
      return token.toUpperCase();
    case 'capitalized':
      return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
    case 'mixed':
      return token.toLowerCase();
  }
}

/**
 * Give `token` the capitalization style of `reference`.
 * An exact match is returned untouched; mixed-case references lower-case the token.
 */
export function restoreCase(reference: string, token: string): string {
  if (reference === token) return token;
  return applyCasing(detectCasing(reference), token);
}
