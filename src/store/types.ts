import type { FileAttributes } from '../rules/types';

export interface FileRecord extends FileAttributes {
  /** null until the rule engine has scored the file at least once. */
  tidyScore: number | null;
}

export type NewFileRecord = Omit<FileRecord, 'tidyScore'>;

/**
 * What add() does when the path is already tracked: `fail` raises
 * DuplicateKeyError, `replace` overwrites the attributes and clears the score.
 */
export type ConflictPolicy = 'fail' | 'replace';

export interface AddOptions {
  onConflict?: ConflictPolicy;
}
