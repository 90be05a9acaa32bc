import Database from 'better-sqlite3';
import Logger from '../logger/Logger';
import { evaluate } from '../rules/RuleEngine';
import { RuleSet } from '../rules/types';
import { StoreConfig } from '../utils/config';
import { errorMessage } from '../utils/errors';
import { DuplicateKeyError, NotFoundError, StorageError, StoreError, StoreOperation } from './errors';
import { AddOptions, FileRecord, NewFileRecord } from './types';

interface FileRow {
  path: string;
  size: number;
  content_signature: string;
  last_modified: number;
  tidy_score: number | null;
}

const TABLE = 'files';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${TABLE} (
    path TEXT PRIMARY KEY NOT NULL,
    size INTEGER NOT NULL,
    content_signature TEXT NOT NULL,
    last_modified INTEGER NOT NULL,
    tidy_score REAL
  )
`;

function toRecord(row: FileRow): FileRecord {
  return {
    path: row.path,
    size: row.size,
    contentSignature: row.content_signature,
    lastModified: row.last_modified,
    tidyScore: row.tidy_score,
  };
}

function prepareStatements(db: Database.Database) {
  return {
    get: db.prepare<[string], FileRow>(`SELECT * FROM ${TABLE} WHERE path = ?`),
    exists: db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${TABLE} WHERE path = ?`),
    all: db.prepare<[], FileRow>(`SELECT * FROM ${TABLE}`),
    count: db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${TABLE}`),
    insert: db.prepare<[FileRow]>(
      `INSERT INTO ${TABLE} (path, size, content_signature, last_modified, tidy_score)
       VALUES (@path, @size, @content_signature, @last_modified, @tidy_score)`
    ),
    upsert: db.prepare<[FileRow]>(
      `INSERT INTO ${TABLE} (path, size, content_signature, last_modified, tidy_score)
       VALUES (@path, @size, @content_signature, @last_modified, @tidy_score)
       ON CONFLICT(path) DO UPDATE SET
         size = excluded.size,
         content_signature = excluded.content_signature,
         last_modified = excluded.last_modified,
         tidy_score = NULL`
    ),
    remove: db.prepare<[string]>(`DELETE FROM ${TABLE} WHERE path = ?`),
    setSignature: db.prepare<[string, string]>(`UPDATE ${TABLE} SET content_signature = ? WHERE path = ?`),
    setLastModified: db.prepare<[number, string]>(`UPDATE ${TABLE} SET last_modified = ? WHERE path = ?`),
    setSize: db.prepare<[number, string]>(`UPDATE ${TABLE} SET size = ? WHERE path = ?`),
    setStat: db.prepare<[number, number, string]>(`UPDATE ${TABLE} SET size = ?, last_modified = ? WHERE path = ?`),
    setPath: db.prepare<[string, string]>(`UPDATE ${TABLE} SET path = ? WHERE path = ?`),
    setScore: db.prepare<[number, string]>(`UPDATE ${TABLE} SET tidy_score = ? WHERE path = ?`),
  };
}

type Statements = ReturnType<typeof prepareStatements>;

/**
 * One record per tracked file, persisted in SQLite. Every operation is a
 * single synchronous statement or transaction, so no caller can observe a
 * record half-updated. Precondition violations and backend failures are
 * thrown, never swallowed; the event pipeline decides what to log.
 *
 * Instances come from MetadataStoreBuilder.
 */
export class MetadataStore {
  private statements: Statements | null = null;

  constructor(
    private readonly config: StoreConfig,
    private readonly db: Database.Database
  ) {}

  initDb(): void {
    this.wrap('initDb', undefined, () => {
      if (this.config.dropOnStart) {
        Logger.warn('Dropping file database on start', { location: this.config.storageLocation });
        this.db.exec(`DROP TABLE IF EXISTS ${TABLE}`);
      }
      this.db.exec(SCHEMA);
      this.statements = prepareStatements(this.db);
    });
    Logger.info('File database initialized', { location: this.config.storageLocation, files: this.count() });
  }

  add(record: NewFileRecord, options: AddOptions = {}): void {
    const row: FileRow = {
      path: record.path,
      size: record.size,
      content_signature: record.contentSignature,
      last_modified: record.lastModified,
      tidy_score: null,
    };
    const onConflict = options.onConflict ?? 'fail';

    this.guard('add', record.path, (stmts) => {
      if (onConflict === 'replace') {
        stmts.upsert.run(row);
        return;
      }
      if (stmts.exists.get(record.path)) {
        throw new DuplicateKeyError('add', record.path);
      }
      stmts.insert.run(row);
    });
  }

  remove(filePath: string): void {
    this.guard('remove', filePath, (stmts) => {
      if (stmts.remove.run(filePath).changes === 0) {
        throw new NotFoundError('remove', filePath);
      }
    });
  }

  get(filePath: string): FileRecord | null {
    return this.guard('get', filePath, (stmts) => {
      const row = stmts.get.get(filePath);
      return row ? toRecord(row) : null;
    });
  }

  has(filePath: string): boolean {
    return this.guard('get', filePath, (stmts) => stmts.exists.get(filePath) !== undefined);
  }

  count(): number {
    return this.guard('count', undefined, (stmts) => stmts.count.get()?.total ?? 0);
  }

  /** Snapshot of every record. Order is unspecified. */
  listAll(): FileRecord[] {
    return this.guard('listAll', undefined, (stmts) => stmts.all.all().map(toRecord));
  }

  updateSignature(filePath: string, signature: string): void {
    this.guard('updateSignature', filePath, (stmts) => {
      this.expectChanged('updateSignature', filePath, stmts.setSignature.run(signature, filePath).changes);
    });
  }

  updateLastModified(filePath: string, timestamp: number): void {
    this.guard('updateLastModified', filePath, (stmts) => {
      this.expectChanged('updateLastModified', filePath, stmts.setLastModified.run(timestamp, filePath).changes);
    });
  }

  updateSize(filePath: string, size: number): void {
    this.guard('updateSize', filePath, (stmts) => {
      this.expectChanged('updateSize', filePath, stmts.setSize.run(size, filePath).changes);
    });
  }

  /** Writes size and modification time in one statement. */
  updateStat(filePath: string, stat: { size: number; lastModified: number }): void {
    this.guard('updateStat', filePath, (stmts) => {
      this.expectChanged('updateStat', filePath, stmts.setStat.run(stat.size, stat.lastModified, filePath).changes);
    });
  }

  updatePath(from: string, to: string): void {
    this.guard('updatePath', from, (stmts) => {
      this.db.transaction(() => {
        if (!stmts.exists.get(from)) {
          throw new NotFoundError('updatePath', from);
        }
        if (from !== to && stmts.exists.get(to)) {
          throw new DuplicateKeyError('updatePath', to);
        }
        stmts.setPath.run(to, from);
      })();
    });
  }

  setScore(filePath: string, score: number): void {
    this.guard('setScore', filePath, (stmts) => {
      this.expectChanged('setScore', filePath, stmts.setScore.run(score, filePath).changes);
    });
  }

  /**
   * Re-scores one record against the rule set. The read, the evaluation and
   * the write happen in one transaction.
   */
  updateGrade(filePath: string, ruleSet: RuleSet, now: number = Date.now()): number {
    return this.guard('updateGrade', filePath, (stmts) =>
      this.db.transaction(() => {
        const row = stmts.get.get(filePath);
        if (!row) {
          throw new NotFoundError('updateGrade', filePath);
        }
        const score = evaluate(toRecord(row), ruleSet, now);
        stmts.setScore.run(score, filePath);
        return score;
      })()
    );
  }

  /** Rescores every record; a record that fails is logged and the rest continue. */
  updateAllGrades(ruleSet: RuleSet, now: number = Date.now()): { scored: number; failed: number } {
    let scored = 0;
    let failed = 0;
    for (const record of this.listAll()) {
      try {
        this.updateGrade(record.path, ruleSet, now);
        scored++;
      } catch (error) {
        failed++;
        Logger.error('Failed to update grade', {
          path: record.path,
          error: errorMessage(error),
        });
      }
    }
    Logger.info('All grades updated', { scored, failed });
    return { scored, failed };
  }

  close(): void {
    this.wrap('close', undefined, () => {
      if (this.db.open) {
        this.db.close();
      }
    });
    this.statements = null;
    Logger.info('File database closed');
  }

  private expectChanged(operation: StoreOperation, filePath: string, changes: number): void {
    if (changes === 0) {
      throw new NotFoundError(operation, filePath);
    }
  }

  private guard<T>(operation: StoreOperation, filePath: string | undefined, fn: (stmts: Statements) => T): T {
    return this.wrap(operation, filePath, () => {
      if (!this.statements) {
        throw new StorageError(operation, new Error('database not initialized, call initDb() first'), filePath);
      }
      return fn(this.statements);
    });
  }

  /** Rethrows store errors as they are and wraps every driver error in a StorageError. */
  private wrap<T>(operation: StoreOperation, filePath: string | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StorageError(operation, error, filePath);
    }
  }
}
