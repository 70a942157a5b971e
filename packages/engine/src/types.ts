/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { RuleSetData } from '@pluralizer/rules';

export type Direction = 'plural' | 'singular';

export type Casing = 'upper' | 'lower' | 'capitalized' | 'mixed';

export type Rule = {
  pattern: RegExp;
  replacement: string;
};

export type RuleMatch = {
  rule: Rule;
  index: number; // position in the table, 0 = oldest
  output: string;
};

export type IrregularEntry = {
  singular: string;
  plural: string;
  compound: boolean;
};

export type IrregularMatch = {
  entry: IrregularEntry;
  kind: 'replace' | 'keep';
  output: string;
};

export type TraceSource = 'empty' | 'uncountable' | 'irregular' | 'rule' | 'identity';

export type InflectionTrace = {
  input: string;
  output: string;
  direction: Direction;
  source: TraceSource;
  rule?: { pattern: string; replacement: string; index: number };
  irregular?: { singular: string; plural: string; kind: 'replace' | 'keep' };
};

export type InflectorOptions = {
  defaults?: RuleSetData | false; // rule set applied by initialize() (default: built-in English)
  debug?: boolean; // log each resolution with console.log (default: false)
};

export type UncountableRule = string | RegExp;

export type PatternSource = string | RegExp;
