import fs from 'fs';
import path from 'path';
import Joi from 'joi';

import { MatchLine, RuleTable } from '../common/interfaces/rules.interface';
import { logDebug } from '../utils/utils';

import bundledRules from '../assets/rules.json';

/**
 * Raised when a rule table fails validation. Carries every violation so a
 * broken custom table can be fixed in one pass.
 */
export class RuleTableError extends Error {
  constructor(
    readonly source: string,
    readonly violations: string[],
  ) {
    super(
      [`Invalid rule table (${source}):`, ...violations.map((violation) => `  • ${violation}`)].join('\n'),
    );
    this.name = 'RuleTableError';
  }
}

const regexMatcher = (value: MatchLine, helpers: Joi.CustomHelpers<MatchLine>) => {
  if (typeof value === 'string' || value.type !== 'regex') return value;

  try {
    new RegExp(value.value);
  } catch (error) {
    return helpers.message({ custom: `"${value.value}" is not a valid regular expression (${error})` });
  }
  return value;
};

const matchLineSchema = Joi.alternatives()
  .try(
    Joi.string().min(1),
    Joi.object({
      type: Joi.string().valid('string', 'regex').required(),
      value: Joi.string().min(1).required(),
    }),
  )
  .custom(regexMatcher);

const ownerKindsSchema = Joi.array().items(Joi.string().min(1)).min(1);

const nextStepSchema = Joi.alternatives().try(
  Joi.string().min(1),
  Joi.object({
    step: Joi.string().min(1).required(),
    owner_kinds: ownerKindsSchema.required(),
  }),
);

const issueTemplateSchema = Joi.object({
  severity: Joi.number().integer().valid(1, 2, 3, 4).required(),
  title: Joi.string().min(1).required(),
  next_steps: Joi.array().items(nextStepSchema).min(1).required(),
});

const ruleTableSchema = Joi.object<RuleTable>({
  suppressions: Joi.array()
    .items(
      Joi.object({
        id: Joi.string().min(1).required(),
        match: Joi.array().items(matchLineSchema).min(1).required(),
      }),
    )
    .unique('id')
    .default([]),

  rules: Joi.array()
    .items(
      Joi.object({
        id: Joi.string().min(1).required(),
        match: Joi.object({
          messages: Joi.array().items(matchLineSchema).min(1).required(),
          owner_kinds: ownerKindsSchema.optional(),
        }).required(),
        issue: issueTemplateSchema.required(),
      }),
    )
    .unique('id')
    .required(),

  fallback: issueTemplateSchema.required(),

  next_steps_fallback: Joi.string().min(1).required(),
}).required();

/**
 * Validates a parsed rule table document.
 *
 * @throws {RuleTableError} listing every schema violation
 */
export function validateRuleTable(document: unknown, source: string): RuleTable {
  const result = ruleTableSchema.validate(document, {
    abortEarly: false,
    convert: true,
  });

  if (result.error) {
    throw new RuleTableError(
      source,
      result.error.details.map((detail) => `${detail.path.join('.') || '(root)'}: ${detail.message}`),
    );
  }

  return result.value;
}

let bundledTable: RuleTable | undefined;

/**
 * Loads the rule table used by the classifier.
 * ====================================================================
 * Without a path the bundled table shipped with the package is returned
 * (validated once, then reused). With a path, a JSON document in the same
 * shape is read from disk and validated on every call.
 */
export function loadRuleTable(filePath?: string): RuleTable {
  if (!filePath) {
    if (!bundledTable) {
      bundledTable = validateRuleTable(bundledRules, 'bundled rules.json');
      logDebug(`Loaded ${bundledTable.rules.length} bundled classification rules`);
    }
    return bundledTable;
  }

  const resolved = path.resolve(filePath);
  let document: unknown;

  try {
    document = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new RuleTableError(resolved, [`could not be read as JSON: ${error}`]);
  }

  const table = validateRuleTable(document, resolved);
  logDebug(`Loaded ${table.rules.length} classification rules from ${resolved}`);
  return table;
}
