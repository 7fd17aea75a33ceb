import { Pool } from 'pg';
import type { PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import { BackendError } from '@tessera/core';
import { logger } from '../utils/logger';
import { IPolicyStorage, IPolicyTransaction, PolicyRow, StoredPolicyRow } from './IPolicyStorage';
import { DEFAULT_TABLE_PREFIX, LinkEntry, LinkTable, LinkTables, createLinkTables, linkTablesInOrder } from './LinkTable';
import { runTransaction, toBackendError } from './transaction';

export interface PostgresPolicyAdapterOptions {
  tablePrefix?: string;
}

function isPool(value: PoolConfig | Pool): value is Pool {
  // pg-mem and other drop-in pools are not instances of pg's Pool
  return value instanceof Pool || ('connect' in value && typeof value.connect === 'function');
}

/**
 * PostgreSQL adapter.
 *
 * Subject matching runs in the database through `regexp_like`, so it needs
 * PostgreSQL 15 or later.
 */
export class PostgresPolicyAdapter implements IPolicyStorage {
  readonly tables: LinkTables;
  private pool: Pool;
  private policyTable: string;

  constructor(configOrPool: PoolConfig | Pool, options?: PostgresPolicyAdapterOptions) {
    if (isPool(configOrPool)) {
      this.pool = configOrPool;
    } else {
      this.pool = new Pool(configOrPool);
    }

    const prefix = options?.tablePrefix ?? DEFAULT_TABLE_PREFIX;
    this.tables = createLinkTables(prefix);
    this.policyTable = prefix;
  }

  async initialize(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS ${this.policyTable} (
          id TEXT NOT NULL PRIMARY KEY,
          description TEXT NOT NULL DEFAULT '',
          effect TEXT NOT NULL CHECK (effect IN ('allow', 'deny')),
          conditions JSONB NOT NULL DEFAULT '[]',
          created_at TIMESTAMP NOT NULL DEFAULT NOW()
        )
      `);
      for (const table of linkTablesInOrder(this.tables)) {
        await client.query(`
          CREATE TABLE IF NOT EXISTS ${table.name} (
            compiled TEXT NOT NULL,
            template TEXT NOT NULL,
            policy TEXT NOT NULL REFERENCES ${this.policyTable} (id) ON DELETE CASCADE,
            PRIMARY KEY (template, policy)
          )
        `);
        await client.query(`CREATE INDEX IF NOT EXISTS idx_${table.name}_policy ON ${table.name} (policy)`);
      }
    } finally {
      client.release();
    }
    logger.info({ tablePrefix: this.policyTable }, '[PostgresPolicyAdapter] Initialized');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async transaction<T>(work: (tx: IPolicyTransaction) => Promise<T>): Promise<T> {
    const client = await this.attempt('Connect', () => this.pool.connect());
    let broken: Error | undefined;
    try {
      return await runTransaction(
        {
          begin: () => this.execute(client, 'BEGIN'),
          commit: () => this.execute(client, 'COMMIT'),
          rollback: () => this.execute(client, 'ROLLBACK'),
        },
        () => work(this.transactionOn(client))
      );
    } catch (err) {
      // a connection that could not roll back must not go back to the pool
      if (err instanceof BackendError && err.rollbackError !== undefined) broken = err;
      throw err;
    } finally {
      client.release(broken);
    }
  }

  async loadPolicy(id: string): Promise<StoredPolicyRow | undefined> {
    const res = await this.query<StoredPolicyRow>(
      `SELECT id, description, effect, conditions FROM ${this.policyTable} WHERE id = $1`,
      [id]
    );
    return res.rows[0];
  }

  async loadTemplates(table: LinkTable, policyId: string): Promise<string[]> {
    const res = await this.query<{ template: string }>(
      `SELECT template FROM ${table.name} WHERE policy = $1`,
      [policyId]
    );
    return res.rows.map((row) => row.template);
  }

  async deletePolicy(id: string): Promise<number> {
    const res = await this.query(`DELETE FROM ${this.policyTable} WHERE id = $1`, [id]);
    return res.rowCount ?? 0;
  }

  async findSubjectMatches(subject: string): Promise<string[]> {
    const res = await this.query<{ policy: string }>(
      `SELECT DISTINCT policy FROM ${this.tables.subject.name} WHERE regexp_like($1::text, compiled)`,
      [subject]
    );
    return res.rows.map((row) => row.policy);
  }

  async findGlobalPolicies(): Promise<string[]> {
    const res = await this.query<{ id: string }>(
      `SELECT p.id FROM ${this.policyTable} p
       LEFT JOIN ${this.tables.subject.name} s ON s.policy = p.id
       WHERE s.policy IS NULL`,
      []
    );
    return res.rows.map((row) => row.id);
  }

  private transactionOn(client: PoolClient): IPolicyTransaction {
    return {
      insertPolicy: async (row: PolicyRow) => {
        await this.attempt('Insert policy', () => client.query(
          `INSERT INTO ${this.policyTable} (id, description, effect, conditions) VALUES ($1, $2, $3, $4)`,
          [row.id, row.description, row.effect, row.conditions]
        ));
      },
      insertLink: async (table: LinkTable, entry: LinkEntry) => {
        await this.attempt(`Insert into ${table.name}`, () => client.query(
          `INSERT INTO ${table.name} (policy, template, compiled) VALUES ($1, $2, $3)`,
          [entry.policy, entry.template, entry.compiled]
        ));
      },
    };
  }

  private async execute(client: PoolClient, sql: string): Promise<void> {
    await client.query(sql);
  }

  private query<R extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[]): Promise<QueryResult<R>> {
    return this.attempt('Query', () => this.pool.query<R>(sql, params));
  }

  private async attempt<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toBackendError(err, action);
    }
  }
}
