import fs from 'fs';
import Logger from '../logger/Logger';
import { errorCode, errorMessage } from '../utils/errors';
import { isRuleKind, validateRuleDefinition } from './RuleValidator';
import { Rule, RuleLoadError, RuleLoadResult, RuleSet } from './types';

export function describeLoadError(error: RuleLoadError): string {
  switch (error.kind) {
    case 'FileNotFound':
      return `rule file not found: ${error.path}`;
    case 'ReadError':
      return `cannot read rule file ${error.path}: ${error.reason}`;
    case 'ParseError':
      return `line ${error.line}: ${error.reason}`;
    case 'UnknownRuleKind':
      return `line ${error.line}: unknown rule kind "${error.name}"`;
  }
}

function freezeRuleSet(rules: Rule[], source: string): RuleSet {
  return Object.freeze({ rules: Object.freeze(rules), loadedAt: Date.now(), source });
}

/**
 * Parses newline-delimited JSON rule definitions. Blank lines and lines
 * starting with # are skipped. Bad lines are reported, good ones kept.
 */
export function parseRuleSet(text: string, source: string): RuleLoadResult {
  const rules: Rule[] = [];
  const errors: RuleLoadError[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = index + 1;
    const content = rawLine.trim();
    if (content.length === 0 || content.startsWith('#')) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      errors.push({ kind: 'ParseError', line, reason: error instanceof Error ? error.message : 'Invalid JSON' });
      return;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      errors.push({ kind: 'ParseError', line, reason: 'rule must be a JSON object' });
      return;
    }

    const def: Record<string, unknown> = { ...parsed };
    if (!isRuleKind(def.kind)) {
      errors.push({ kind: 'UnknownRuleKind', name: String(def.kind), line });
      return;
    }

    const validation = validateRuleDefinition(def);
    if (!validation.valid || !validation.rule) {
      errors.push({
        kind: 'ParseError',
        line,
        reason: validation.errors.map((e) => `${e.field}: ${e.message}`).join('; '),
      });
      return;
    }
    rules.push(validation.rule);
  });

  for (const error of errors) {
    Logger.warn('Skipping malformed rule', { source, error: describeLoadError(error) });
  }

  return { ruleSet: freezeRuleSet(rules, source), loaded: rules.length, errors };
}

/** Never rejects: an unreadable file yields an empty rule set and one error. */
export async function loadRuleSet(filePath: string): Promise<RuleLoadResult> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    const loadError: RuleLoadError =
      errorCode(error) === 'ENOENT'
        ? { kind: 'FileNotFound', path: filePath }
        : { kind: 'ReadError', path: filePath, reason: errorMessage(error) };
    Logger.error('Rule file could not be read', { path: filePath, error: describeLoadError(loadError) });
    return { ruleSet: freezeRuleSet([], filePath), loaded: 0, errors: [loadError] };
  }

  const result = parseRuleSet(text, filePath);
  Logger.info('Rule set loaded', { path: filePath, loaded: result.loaded, rejected: result.errors.length });
  return result;
}
