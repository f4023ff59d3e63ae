// ---------------------------------------------------------------------------
// SQLite unit of work via better-sqlite3
// ---------------------------------------------------------------------------

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import DatabaseConstructor, { type Database } from 'better-sqlite3';
import { getConfiguration } from '../../config.js';
import type { Logger } from '../../logging/logger.js';
import { SCHEMA_SQL } from './schema.js';

export type CommitHook = () => void;

/**
 * Connection wrapper that owns transaction nesting and after-commit hooks.
 *
 * The outermost `withTransaction` opens `BEGIN IMMEDIATE`, so check-then-write
 * sequences inside it are serialized against other connections. Nested calls
 * use savepoints. Hooks registered with `onCommit` run only after the
 * outermost transaction commits; a rollback discards them.
 */
export class LedgerDatabase {
  readonly connection: Database;
  private readonly logger: Logger;
  private depth = 0;
  private hooks: CommitHook[] = [];

  constructor(connection: Database, logger?: Logger) {
    this.connection = connection;
    this.logger = (logger ?? getConfiguration().logger).child({ component: 'database' });
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  /**
   * Execute `fn` atomically. `fn` must be synchronous.
   *
   * @returns The return value of `fn`.
   */
  withTransaction<T>(fn: () => T): T {
    if (this.depth === 0) {
      return this.runOutermost(fn);
    }
    return this.runNested(fn);
  }

  /**
   * Run `hook` once the current transaction commits, or now when there is none.
   * A throwing hook is logged; it cannot undo the commit.
   */
  onCommit(hook: CommitHook): void {
    if (this.depth === 0) {
      this.runHooks([hook]);
      return;
    }
    this.hooks.push(hook);
  }

  close(): void {
    this.connection.close();
  }

  private runOutermost<T>(fn: () => T): T {
    this.connection.exec('BEGIN IMMEDIATE');
    this.depth = 1;
    let result: T;
    try {
      result = ensureSync(fn());
      this.connection.exec('COMMIT');
    } catch (err) {
      this.hooks = [];
      if (this.connection.inTransaction) {
        this.connection.exec('ROLLBACK');
      }
      throw err;
    } finally {
      this.depth = 0;
    }

    const hooks = this.hooks;
    this.hooks = [];
    this.runHooks(hooks);
    return result;
  }

  private runNested<T>(fn: () => T): T {
    const savepoint = `sp_${this.depth}`;
    const mark = this.hooks.length;
    this.connection.exec(`SAVEPOINT ${savepoint}`);
    this.depth++;
    try {
      const result = ensureSync(fn());
      this.connection.exec(`RELEASE ${savepoint}`);
      return result;
    } catch (err) {
      this.connection.exec(`ROLLBACK TO ${savepoint}`);
      this.connection.exec(`RELEASE ${savepoint}`);
      this.hooks.length = mark;
      throw err;
    } finally {
      this.depth--;
    }
  }

  private runHooks(hooks: readonly CommitHook[]): void {
    for (const hook of hooks) {
      try {
        hook();
      } catch (error) {
        this.logger.error('After-commit hook failed', { error });
      }
    }
  }
}

function ensureSync<T>(value: T): T {
  if (value instanceof Promise) {
    throw new TypeError('Transaction callbacks must be synchronous');
  }
  return value;
}

/**
 * Execute a DDL migration inside a transaction.
 */
export function runMigration(db: Database, sql: string): void {
  db.exec('BEGIN');
  try {
    db.exec(sql);
    db.exec('COMMIT');
  } catch (err) {
    db.exec('ROLLBACK');
    throw err;
  }
}

export interface OpenDatabaseOptions {
  logger?: Logger;
  /** Apply the ledger schema (default: true) */
  migrate?: boolean;
}

/**
 * Open (or create) a ledger database. `:memory:` gives a private in-memory one.
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): LedgerDatabase {
  const inMemory = path === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new DatabaseConstructor(path);
  if (!inMemory) {
    connection.pragma('journal_mode = WAL');
  }
  connection.pragma('foreign_keys = ON');
  connection.pragma('busy_timeout = 5000');

  if (options.migrate ?? true) {
    runMigration(connection, SCHEMA_SQL);
  }

  return new LedgerDatabase(connection, options.logger);
}
