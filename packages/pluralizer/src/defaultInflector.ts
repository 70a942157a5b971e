/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import { Inflector, type InflectorOptions } from '@pluralizer/engine';

/**
 * Process-wide instance behind the free functions.
 * Registration mutates it for every caller in the process.
 */
export const defaultInflector = new Inflector();

/**
 * Populate the default tables. Safe to call any number of times;
 * every other function initializes on first use anyway.
 */
export function initialize(): void {
  defaultInflector.initialize();
}

/** Forget every registered rule and go back to the built-in tables. */
export function reset(): void {
  defaultInflector.reset();
}

/**
 * Create an inflector with its own tables, isolated from the shared one.
 *
 * @example
 * const strict = createInflector({ defaults: false });
 * strict.addPluralRule('$', 's');
 */
export function createInflector(options?: InflectorOptions): Inflector {
  return new Inflector(options);
}
