/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

export { pluralize, toPlural, toSingular, isPlural, isSingular, explain } from './pluralize';
export { addPluralRule, addSingularRule, addIrregularRule, addUncountableRule, loadRuleSet } from './rules';
export { initialize, reset, createInflector, defaultInflector } from './defaultInflector';
export * from '@pluralizer/engine';
export { DEFAULT_RULE_SET, validateRuleSet, type RuleSetData, type RulePair, type IrregularPair } from '@pluralizer/rules';
