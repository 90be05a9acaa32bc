import path from 'path';
import Logger from '../logger/Logger';
import { FileAttributes, Rule, RuleSet } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function pathDepth(filePath: string): number {
  return path.resolve(filePath).split(path.sep).filter((segment) => segment.length > 0).length;
}

/** Whether a single rule holds for the file. Pure: no state survives the call. */
export function isSatisfied(rule: Rule, file: FileAttributes, now: number): boolean {
  switch (rule.kind) {
    case 'extension':
      return rule.extensions.includes(path.extname(file.path).toLowerCase());
    case 'name_pattern': {
      const matched = rule.pattern.test(path.basename(file.path));
      return rule.negate ? !matched : matched;
    }
    case 'age':
      return now - file.lastModified > rule.maxAgeDays * DAY_MS;
    case 'depth':
      return pathDepth(file.path) > rule.maxDepth;
    case 'size':
      return file.size >= rule.minBytes;
  }
}

/**
 * Sums the weights of every satisfied rule. A rule that throws is logged
 * and contributes nothing, so one bad rule never blocks scoring.
 */
export function evaluate(file: FileAttributes, ruleSet: RuleSet, now: number = Date.now()): number {
  let score = 0;
  for (const rule of ruleSet.rules) {
    try {
      if (isSatisfied(rule, file, now)) {
        score += rule.weight;
      }
    } catch (error) {
      Logger.warn('Rule evaluation failed, skipping rule', {
        rule: rule.name,
        kind: rule.kind,
        path: file.path,
        error: error instanceof Error ? error.message : 'Unknown',
      });
    }
  }
  Logger.debug('File scored', { path: file.path, score, rules: ruleSet.rules.length });
  return score;
}
