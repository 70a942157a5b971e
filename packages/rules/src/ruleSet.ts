/**
 * Copyright (c) 2025 LangPatrol (Gavel Inc.)
 * Licensed under the MIT License.
 * See LICENSE file for details.
 */
// SPDX-License-Identifier: MIT

import Ajv, { type ErrorObject } from 'ajv';

/** A pattern source (matched case-insensitively) and its replacement template. */
export type RulePair = [pattern: string, replacement: string];

export type IrregularPair = {
  singular: string;
  plural: string;
  /** Also match as the tail of a closed compound, e.g. "forefoot". */
  compound?: boolean;
};

export type RuleSetData = {
  irregular?: IrregularPair[];
  plural?: RulePair[];
  singular?: RulePair[];
  uncountable?: string[];
  uncountablePatterns?: string[];
};

const rulePairSchema = {
  type: 'array',
  items: [
    { type: 'string', minLength: 1 },
    { type: 'string' }
  ],
  minItems: 2,
  additionalItems: false
};

export const RULE_SET_SCHEMA = {
  $id: 'https://pluralizer.dev/schemas/rule-set.json',
  title: 'Pluralizer rule set',
  type: 'object',
  properties: {
    irregular: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          singular: { type: 'string', minLength: 1 },
          plural: { type: 'string', minLength: 1 },
          compound: { type: 'boolean' }
        },
        required: ['singular', 'plural'],
        additionalProperties: false
      }
    },
    plural: { type: 'array', items: rulePairSchema },
    singular: { type: 'array', items: rulePairSchema },
    uncountable: { type: 'array', items: { type: 'string', minLength: 1 }, uniqueItems: true },
    uncountablePatterns: { type: 'array', items: { type: 'string', minLength: 1 } }
  },
  additionalProperties: false
};

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  logger: false // Suppress console output
});

const validate = ajv.compile<RuleSetData>(RULE_SET_SCHEMA);

export type RuleSetValidation =
  | { valid: true; ruleSet: RuleSetData }
  | { valid: false; errors: string[] };

function formatError(error: ErrorObject): string {
  const path = error.instancePath || '/';
  return `${path} ${error.message ?? error.keyword}`;
}

export function validateRuleSet(data: unknown): RuleSetValidation {
  if (validate(data)) {
    return { valid: true, ruleSet: data };
  }
  return { valid: false, errors: (validate.errors ?? []).map(formatError) };
}

/**
 * Validate `data` against the rule-set schema and return it typed.
 * Throws with every schema violation listed when the data is malformed.
 */
export function parseRuleSet(data: unknown, source = 'rule set'): RuleSetData {
  const result = validateRuleSet(data);
  if (!result.valid) {
    throw new Error(`Invalid ${source}: ${result.errors.join('; ')}`);
  }
  return result.ruleSet;
}
