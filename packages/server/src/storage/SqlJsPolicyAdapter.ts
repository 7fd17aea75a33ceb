import fs from 'fs';
import initSqlJs from 'sql.js';
import type { BindParams, Database, ParamsObject, SqlValue } from 'sql.js';
import { BackendError } from '@tessera/core';
import { logger } from '../utils/logger';
import { IPolicyStorage, IPolicyTransaction, PolicyRow, StoredPolicyRow } from './IPolicyStorage';
import { DEFAULT_TABLE_PREFIX, LinkEntry, LinkTable, LinkTables, createLinkTables, linkTablesInOrder } from './LinkTable';
import { PatternCache } from './PatternCache';
import { runTransaction, toBackendError } from './transaction';

export interface SqlJsPolicyConfig {
  /**
   * Path of the SQLite database file. The file is loaded on initialize and
   * rewritten after every committed write.
   * Use ':memory:' for a database that lives only in the process.
   */
  filename: string;

  /**
   * Log every SQL statement at debug level.
   */
  verbose?: boolean;

  tablePrefix?: string;
}

const IN_MEMORY = ':memory:';

function textColumn(row: ParamsObject, column: string): string {
  const value: SqlValue | undefined = row[column];
  if (typeof value !== 'string') {
    throw new BackendError(`Expected text in column ${column}, got ${value === null ? 'null' : typeof value}`);
  }
  return value;
}

/**
 * SQLite adapter on sql.js (SQLite compiled to WebAssembly).
 *
 * The database lives in memory and is written back to `filename` after each
 * committed change. There is a single connection, so operations are queued:
 * while a transaction is open no other call runs, and nothing sees its
 * uncommitted rows. Do not call the adapter's own methods from inside
 * `transaction()` work; they wait for the transaction and never run.
 *
 * Subject matching uses a `regexp_like` SQL function registered on the
 * connection.
 */
export class SqlJsPolicyAdapter implements IPolicyStorage {
  readonly tables: LinkTables;
  private readonly filename: string;
  private readonly verbose: boolean;
  private policyTable: string;
  private patterns = new PatternCache();
  private db?: Database;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: SqlJsPolicyConfig) {
    const prefix = config.tablePrefix ?? DEFAULT_TABLE_PREFIX;
    this.tables = createLinkTables(prefix);
    this.policyTable = prefix;
    this.filename = config.filename;
    this.verbose = config.verbose ?? false;
  }

  initialize(): Promise<void> {
    return this.exclusive(async () => {
      if (!this.db) {
        const SQL = await initSqlJs();
        const existing = this.persistent() && fs.existsSync(this.filename) ? fs.readFileSync(this.filename) : undefined;
        this.db = new SQL.Database(existing);
        this.configureConnection(this.db);
      }

      const linkSchemas = linkTablesInOrder(this.tables)
        .map(
          (table) => `
          CREATE TABLE IF NOT EXISTS ${table.name} (
            compiled TEXT NOT NULL,
            template TEXT NOT NULL,
            policy TEXT NOT NULL REFERENCES ${this.policyTable} (id) ON DELETE CASCADE,
            PRIMARY KEY (template, policy)
          );
          CREATE INDEX IF NOT EXISTS idx_${table.name}_policy ON ${table.name} (policy);`
        )
        .join('\n');

      this.attempt('Initialize schema', () =>
        this.database().exec(`
          CREATE TABLE IF NOT EXISTS ${this.policyTable} (
            id TEXT NOT NULL PRIMARY KEY,
            description TEXT NOT NULL DEFAULT '',
            effect TEXT NOT NULL CHECK (effect IN ('allow', 'deny')),
            conditions TEXT NOT NULL DEFAULT '[]',
            created_at INTEGER DEFAULT (strftime('%s', 'now') * 1000)
          );
          ${linkSchemas}
        `)
      );
      await this.persist();

      logger.info({ tablePrefix: this.policyTable, filename: this.filename }, '[SqlJsPolicyAdapter] Initialized');
    });
  }

  async close(): Promise<void> {
    await this.exclusive(async () => {
      this.db?.close();
      this.db = undefined;
    });
    logger.info('[SqlJsPolicyAdapter] Database closed');
  }

  transaction<T>(work: (tx: IPolicyTransaction) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const result = await runTransaction(
        {
          begin: async () => {
            this.run('BEGIN');
          },
          commit: async () => {
            this.run('COMMIT');
          },
          rollback: async () => {
            this.run('ROLLBACK');
          },
        },
        () => work(this.transactionHandle())
      );
      await this.persist();
      return result;
    });
  }

  loadPolicy(id: string): Promise<StoredPolicyRow | undefined> {
    return this.exclusive(async () =>
      this.attempt('Load policy', () => {
        const [row] = this.all(
          `SELECT id, description, effect, conditions FROM ${this.policyTable} WHERE id = ?`,
          [id]
        );
        if (!row) return undefined;
        return {
          id: textColumn(row, 'id'),
          description: textColumn(row, 'description'),
          effect: textColumn(row, 'effect'),
          conditions: row.conditions,
        };
      })
    );
  }

  loadTemplates(table: LinkTable, policyId: string): Promise<string[]> {
    return this.exclusive(async () =>
      this.attempt(`Load ${table.name}`, () =>
        this.all(`SELECT template FROM ${table.name} WHERE policy = ?`, [policyId]).map((row) =>
          textColumn(row, 'template')
        )
      )
    );
  }

  deletePolicy(id: string): Promise<number> {
    return this.exclusive(async () => {
      const removed = this.attempt('Delete policy', () => {
        this.run(`DELETE FROM ${this.policyTable} WHERE id = ?`, [id]);
        return this.database().getRowsModified();
      });
      if (removed > 0) await this.persist();
      return removed;
    });
  }

  findSubjectMatches(subject: string): Promise<string[]> {
    return this.exclusive(async () =>
      this.attempt('Match subjects', () =>
        this.all(`SELECT DISTINCT policy FROM ${this.tables.subject.name} WHERE regexp_like(?, compiled)`, [
          subject,
        ]).map((row) => textColumn(row, 'policy'))
      )
    );
  }

  findGlobalPolicies(): Promise<string[]> {
    return this.exclusive(async () =>
      this.attempt('Find global policies', () =>
        this.all(`
          SELECT p.id FROM ${this.policyTable} p
          LEFT JOIN ${this.tables.subject.name} s ON s.policy = p.id
          WHERE s.policy IS NULL
        `).map((row) => textColumn(row, 'id'))
      )
    );
  }

  private transactionHandle(): IPolicyTransaction {
    return {
      insertPolicy: async (row: PolicyRow) => {
        this.attempt('Insert policy', () =>
          this.run(`INSERT INTO ${this.policyTable} (id, description, effect, conditions) VALUES (?, ?, ?, ?)`, [
            row.id,
            row.description,
            row.effect,
            row.conditions,
          ])
        );
      },
      insertLink: async (table: LinkTable, entry: LinkEntry) => {
        this.attempt(`Insert into ${table.name}`, () =>
          this.run(`INSERT INTO ${table.name} (policy, template, compiled) VALUES (?, ?, ?)`, [
            entry.policy,
            entry.template,
            entry.compiled,
          ])
        );
      },
    };
  }

  /**
   * Per-connection settings. sql.js reopens the connection on export, which
   * drops them, so this runs again after every persist.
   */
  private configureConnection(db: Database): void {
    // cascade deletes of link rows depend on this
    db.run('PRAGMA foreign_keys = ON');
    db.create_function('regexp_like', (subject: unknown, pattern: unknown) => {
      if (typeof subject !== 'string' || typeof pattern !== 'string') return 0;
      return this.patterns.test(pattern, subject) ? 1 : 0;
    });
  }

  private async persist(): Promise<void> {
    if (!this.persistent()) return;
    const db = this.database();
    const data = db.export();
    this.configureConnection(db);
    try {
      const tmp = `${this.filename}.tmp`;
      await fs.promises.writeFile(tmp, data);
      await fs.promises.rename(tmp, this.filename);
    } catch (err) {
      throw toBackendError(err, `Write ${this.filename}`);
    }
  }

  private persistent(): boolean {
    return this.filename !== IN_MEMORY;
  }

  private run(sql: string, params?: BindParams): void {
    if (this.verbose) logger.debug({ sql }, 'sqlite');
    this.database().run(sql, params);
  }

  private all(sql: string, params?: BindParams): ParamsObject[] {
    if (this.verbose) logger.debug({ sql }, 'sqlite');
    const statement = this.database().prepare(sql);
    try {
      if (params) statement.bind(params);
      const rows: ParamsObject[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  /**
   * Runs operations one at a time on the shared connection.
   */
  private exclusive<T>(op: () => Promise<T>): Promise<T> {
    const result = this.queue.then(op);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private database(): Database {
    if (!this.db) {
      throw new BackendError('SqlJsPolicyAdapter used before initialize() or after close()');
    }
    return this.db;
  }

  private attempt<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toBackendError(err, action);
    }
  }

  // Additional utility methods

  /**
   * Health check - verify database is accessible
   */
  async ping(): Promise<boolean> {
    try {
      this.database().exec('SELECT 1');
      return true;
    } catch (err) {
      logger.warn({ err }, '[SqlJsPolicyAdapter] Ping failed');
      return false;
    }
  }

  /**
   * Snapshot of the whole database as a SQLite file image.
   */
  export(): Promise<Uint8Array> {
    return this.exclusive(async () => {
      const db = this.database();
      const data = db.export();
      this.configureConnection(db);
      return data;
    });
  }
}
