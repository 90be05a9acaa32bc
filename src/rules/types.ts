export type RuleKind = 'extension' | 'name_pattern' | 'age' | 'depth' | 'size';

export const RULE_KINDS: readonly RuleKind[] = ['extension', 'name_pattern', 'age', 'depth', 'size'];

export interface BaseRule {
  kind: RuleKind;
  name: string;
  weight: number;
}

export interface ExtensionRule extends BaseRule {
  kind: 'extension';
  extensions: readonly string[];
}

export interface NamePatternRule extends BaseRule {
  kind: 'name_pattern';
  pattern: RegExp;
  negate: boolean;
}

export interface AgeRule extends BaseRule {
  kind: 'age';
  maxAgeDays: number;
}

export interface DepthRule extends BaseRule {
  kind: 'depth';
  maxDepth: number;
}

export interface SizeRule extends BaseRule {
  kind: 'size';
  minBytes: number;
}

export type Rule = ExtensionRule | NamePatternRule | AgeRule | DepthRule | SizeRule;

export interface RuleSet {
  readonly rules: readonly Rule[];
  readonly loadedAt: number;
  readonly source: string;
}

/** The scoring-relevant projection of a file record. */
export interface FileAttributes {
  path: string;
  size: number;
  lastModified: number;
  contentSignature: string;
}

export type RuleLoadError =
  | { kind: 'FileNotFound'; path: string }
  | { kind: 'ReadError'; path: string; reason: string }
  | { kind: 'ParseError'; line: number; reason: string }
  | { kind: 'UnknownRuleKind'; name: string; line: number };

export interface RuleLoadResult {
  ruleSet: RuleSet;
  loaded: number;
  errors: RuleLoadError[];
}
