/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

export { Inflector } from './inflector';
export * from './types';

// Table building blocks for callers that assemble their own dispatch
export { PatternRuleTable } from './rules/patternRules';
export { IrregularTable } from './rules/irregular';
export { UncountableSet } from './rules/uncountable';
export { detectCasing, applyCasing, restoreCase } from './util/casing';
export { compilePattern, interpolate, applyRule } from './util/pattern';
