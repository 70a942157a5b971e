/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import type { PatternSource, Rule, RuleMatch } from '../types';
import { applyRule, compilePattern } from '../util/pattern';

/**
 * Ordered list of suffix rules for one direction.
 * The most recently added matching rule wins.
 */
export class PatternRuleTable {
  private readonly rules: Rule[] = [];

  get size(): number {
    return this.rules.length;
  }

  add(pattern: PatternSource, replacement: string): Rule {
    const rule: Rule = { pattern: compilePattern(pattern), replacement };
    this.rules.push(rule);
    return rule;
  }

  match(word: string): RuleMatch | null {
    for (let index = this.rules.length - 1; index >= 0; index--) {
      const rule = this.rules[index];
      const output = applyRule(word, rule);
      if (output !== null) {
        return { rule, index, output };
      }
    }
    return null;
  }

  clear(): void {
    this.rules.length = 0;
  }
}
