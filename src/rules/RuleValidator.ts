import { Rule, RuleKind, RULE_KINDS } from './types';

export interface ValidationError {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  rule?: Rule;
}

const MAX_NAME_LENGTH = 100;
const MAX_PATTERN_LENGTH = 500;
const REGEX_FLAGS = /^[imsu]*$/;

export function isRuleKind(value: unknown): value is RuleKind {
  return RULE_KINDS.some((kind) => kind === value);
}

/**
 * Checks one raw rule definition and, when it is valid, returns the
 * frozen Rule built from it.
 */
export function validateRuleDefinition(def: Record<string, unknown>): ValidationResult {
  const errors: ValidationError[] = [];
  const { kind, name, weight } = def;

  if (!isRuleKind(kind)) {
    errors.push({ field: 'kind', message: `Unknown rule kind "${String(kind)}"` });
    return { valid: false, errors };
  }

  if (typeof name !== 'string' || name.trim().length === 0) {
    errors.push({ field: 'name', message: 'name must be a non-empty string' });
  } else if (name.length > MAX_NAME_LENGTH) {
    errors.push({ field: 'name', message: `name must be ${MAX_NAME_LENGTH} characters or less` });
  }

  if (typeof weight !== 'number' || !Number.isFinite(weight)) {
    errors.push({ field: 'weight', message: 'weight must be a finite number' });
  }

  const base = { name: typeof name === 'string' ? name.trim() : '', weight: typeof weight === 'number' ? weight : 0 };
  let rule: Rule | undefined;

  switch (kind) {
    case 'extension': {
      const { extensions } = def;
      if (!Array.isArray(extensions) || extensions.length === 0) {
        errors.push({ field: 'extensions', message: 'extensions must be a non-empty array of strings' });
        break;
      }
      const normalized: string[] = [];
      for (const ext of extensions) {
        if (typeof ext !== 'string' || !ext.startsWith('.') || ext.length < 2) {
          errors.push({ field: 'extensions', message: `Extension "${String(ext)}" must start with "."` });
        } else {
          normalized.push(ext.toLowerCase());
        }
      }
      rule = { kind, ...base, extensions: Object.freeze(normalized) };
      break;
    }
    case 'name_pattern': {
      const { pattern, flags, negate } = def;
      if (typeof pattern !== 'string' || pattern.length === 0) {
        errors.push({ field: 'pattern', message: 'pattern must be a non-empty string' });
        break;
      }
      if (pattern.length > MAX_PATTERN_LENGTH) {
        errors.push({ field: 'pattern', message: `pattern must be ${MAX_PATTERN_LENGTH} characters or less` });
        break;
      }
      const regexFlags = flags === undefined ? '' : flags;
      if (typeof regexFlags !== 'string' || !REGEX_FLAGS.test(regexFlags)) {
        errors.push({ field: 'flags', message: 'flags may only contain i, m, s, u' });
        break;
      }
      const negated = negate === undefined ? false : negate;
      if (typeof negated !== 'boolean') {
        errors.push({ field: 'negate', message: 'negate must be a boolean' });
        break;
      }
      try {
        rule = { kind, ...base, pattern: new RegExp(pattern, regexFlags), negate: negated };
      } catch (error) {
        errors.push({
          field: 'pattern',
          message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
      break;
    }
    case 'age': {
      const { maxAgeDays } = def;
      if (typeof maxAgeDays !== 'number' || !Number.isFinite(maxAgeDays) || maxAgeDays <= 0) {
        errors.push({ field: 'maxAgeDays', message: 'maxAgeDays must be a positive number' });
        break;
      }
      rule = { kind, ...base, maxAgeDays };
      break;
    }
    case 'depth': {
      const { maxDepth } = def;
      if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 0) {
        errors.push({ field: 'maxDepth', message: 'maxDepth must be a non-negative integer' });
        break;
      }
      rule = { kind, ...base, maxDepth };
      break;
    }
    case 'size': {
      const { minBytes } = def;
      if (typeof minBytes !== 'number' || !Number.isInteger(minBytes) || minBytes < 0) {
        errors.push({ field: 'minBytes', message: 'minBytes must be a non-negative integer' });
        break;
      }
      rule = { kind, ...base, minBytes };
      break;
    }
  }

  if (errors.length > 0 || !rule) {
    return { valid: false, errors };
  }
  return { valid: true, errors, rule: Object.freeze(rule) };
}
