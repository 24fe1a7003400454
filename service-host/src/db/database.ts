/**
 * SQLite Database for the POS host
 *
 * Thin wrapper over better-sqlite3:
 * - every business operation runs in one BEGIN IMMEDIATE transaction, which
 *   serializes writers across connections and processes sharing the file
 * - nested transaction() calls become savepoints
 * - afterCommit() hooks run once the outermost transaction commits and are
 *   dropped if it (or the savepoint that queued them) rolls back
 * - driver errors surface as ImmutabilityViolation or PersistenceFailure
 */

import BetterSqlite3 from 'better-sqlite3';
import { CREATE_SCHEMA_SQL, IMMUTABLE_MESSAGE_PREFIX, SCHEMA_VERSION } from './schema.js';
import { ImmutabilityViolation, PersistenceFailure, PosError, toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('Database');

export type SqlParam = string | number | bigint | Buffer | null;

interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

type AfterCommitHook = () => void;

function isSqliteError(error: unknown): error is Error & { code: string } {
  return error instanceof Error
    && 'code' in error
    && typeof error.code === 'string'
    && error.code.startsWith('SQLITE_');
}

export function translateError(error: unknown): Error {
  if (error instanceof PosError) {
    return error;
  }
  if (isSqliteError(error)) {
    if (error.message.startsWith(IMMUTABLE_MESSAGE_PREFIX)) {
      return new ImmutabilityViolation(error.message.slice(IMMUTABLE_MESSAGE_PREFIX.length).trim(), {
        sqliteCode: error.code,
      });
    }
    return new PersistenceFailure(error.message, { sqliteCode: error.code });
  }
  return toError(error);
}

export class Database {
  private db: BetterSqlite3.Database;
  private dbPath: string;
  private afterCommitStack: AfterCommitHook[][] = [];

  constructor(dbPath: string, options: { busyTimeoutMs?: number } = {}) {
    this.dbPath = dbPath;
    this.db = new BetterSqlite3(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  }

  get path(): string {
    return this.dbPath;
  }

  initialize(): void {
    this.createSchema();
    this.checkSchemaVersion();
  }

  private createSchema(): void {
    this.db.exec(CREATE_SCHEMA_SQL);
  }

  private checkSchemaVersion(): void {
    const row = this.get<{ version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1');

    if (!row) {
      this.run('INSERT INTO schema_version (version) VALUES (?)', [SCHEMA_VERSION]);
    } else if (row.version < SCHEMA_VERSION) {
      logger.info('Schema migration needed', { from: row.version, to: SCHEMA_VERSION });
      this.run('INSERT INTO schema_version (version) VALUES (?)', [SCHEMA_VERSION]);
    }
  }

  // ==========================================================================
  // Generic query methods
  // ==========================================================================

  run(sql: string, params: SqlParam[] = []): RunResult {
    try {
      return this.db.prepare<SqlParam[]>(sql).run(...params);
    } catch (error) {
      throw translateError(error);
    }
  }

  get<T>(sql: string, params: SqlParam[] = []): T | undefined {
    try {
      return this.db.prepare<SqlParam[], T>(sql).get(...params);
    } catch (error) {
      throw translateError(error);
    }
  }

  all<T>(sql: string, params: SqlParam[] = []): T[] {
    try {
      return this.db.prepare<SqlParam[], T>(sql).all(...params);
    } catch (error) {
      throw translateError(error);
    }
  }

  exec(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (error) {
      throw translateError(error);
    }
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Runs `fn` atomically. The outermost call takes the write lock up front
   * (BEGIN IMMEDIATE); nested calls are savepoints that can fail on their own.
   */
  transaction<T>(fn: () => T): T {
    this.afterCommitStack.push([]);
    let result: T;
    try {
      result = this.db.transaction(fn).immediate();
    } catch (error) {
      this.afterCommitStack.pop();
      throw translateError(error);
    }

    const hooks = this.afterCommitStack.pop() ?? [];
    const parent = this.afterCommitStack[this.afterCommitStack.length - 1];
    if (parent) {
      parent.push(...hooks);
    } else {
      this.runHooks(hooks);
    }
    return result;
  }

  /** Queues a side effect for after the commit; runs it now when no transaction is open. */
  afterCommit(hook: AfterCommitHook): void {
    const current = this.afterCommitStack[this.afterCommitStack.length - 1];
    if (current) {
      current.push(hook);
    } else {
      this.runHooks([hook]);
    }
  }

  private runHooks(hooks: AfterCommitHook[]): void {
    for (const hook of hooks) {
      try {
        hook();
      } catch (error) {
        logger.error('After-commit side effect failed', toError(error));
      }
    }
  }

  /**
   * Allocates the next value of a per-day counter. Must run inside the
   * business transaction that consumes the number: the increment commits or
   * rolls back with the record carrying it, so committed numbers never repeat
   * and never skip.
   */
  nextSequence(name: string, day: string): number {
    const row = this.get<{ value: number }>(
      `INSERT INTO sequences (name, day, value) VALUES (?, ?, 1)
       ON CONFLICT(name, day) DO UPDATE SET value = value + 1
       RETURNING value`,
      [name, day]
    );
    if (!row) {
      throw new PersistenceFailure(`Sequence allocation failed: ${name}/${day}`);
    }
    return row.value;
  }

  close(): void {
    this.db.close();
  }
}
