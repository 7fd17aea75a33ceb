import type { PoolConfig } from 'pg';
import { loadConfig } from '../config/env-schema';
import { logger } from '../utils/logger';
import { IPolicyStorage } from './IPolicyStorage';
import { MemoryPolicyAdapter } from './MemoryPolicyAdapter';
import { PostgresPolicyAdapter } from './PostgresPolicyAdapter';

export type StorageMode = 'sqlite' | 'postgres' | 'memory';

export interface StorageConfig {
  mode?: StorageMode;
  // SQLite options
  sqlitePath?: string;
  sqliteVerbose?: boolean;
  // PostgreSQL options
  postgresHost?: string;
  postgresPort?: number;
  postgresUser?: string;
  postgresPassword?: string;
  postgresDatabase?: string;
  postgresConnectionString?: string;
  // Table prefix (for both SQLite and PostgreSQL)
  tablePrefix?: string;
}

/**
 * Creates and initializes a storage adapter.
 *
 * Explicit config wins over environment variables, which win over defaults
 * (in-memory storage).
 *
 * Environment variables:
 * - STORAGE_MODE: 'sqlite' | 'postgres' | 'memory'
 * - DB_PATH: SQLite file path (default: './tessera.db')
 * - DATABASE_URL: PostgreSQL connection string
 * - DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME: PostgreSQL config
 * - POLICY_TABLE_PREFIX: table name prefix (default: 'acl_policy')
 */
export async function createStorageAdapter(
  config?: StorageConfig,
  env: NodeJS.ProcessEnv = process.env
): Promise<IPolicyStorage> {
  const envConfig = loadConfig(env);
  const mode = config?.mode ?? envConfig.STORAGE_MODE;
  const tablePrefix = config?.tablePrefix ?? envConfig.POLICY_TABLE_PREFIX;

  let adapter: IPolicyStorage;
  switch (mode) {
    case 'sqlite': {
      // Loaded lazily so memory and postgres setups never load sql.js
      const { SqlJsPolicyAdapter } = await import('./SqlJsPolicyAdapter');

      const sqlitePath = config?.sqlitePath ?? envConfig.DB_PATH;
      logger.info({ sqlitePath }, '[Storage] Using SQLite');

      adapter = new SqlJsPolicyAdapter({
        filename: sqlitePath,
        verbose: config?.sqliteVerbose ?? envConfig.SQLITE_VERBOSE,
        tablePrefix,
      });
      break;
    }

    case 'postgres': {
      const connectionString = config?.postgresConnectionString ?? envConfig.DATABASE_URL;

      let pgConfig: PoolConfig;
      if (connectionString) {
        pgConfig = { connectionString };
      } else {
        pgConfig = {
          host: config?.postgresHost ?? envConfig.DB_HOST ?? 'localhost',
          port: config?.postgresPort ?? envConfig.DB_PORT,
          user: config?.postgresUser ?? envConfig.DB_USER ?? 'tessera',
          password: config?.postgresPassword ?? envConfig.DB_PASSWORD,
          database: config?.postgresDatabase ?? envConfig.DB_NAME ?? 'tessera',
        };
      }

      logger.info(
        { host: pgConfig.host ?? 'from connection string', port: pgConfig.port, database: pgConfig.database },
        '[Storage] Using PostgreSQL'
      );

      adapter = new PostgresPolicyAdapter(pgConfig, { tablePrefix });
      break;
    }

    case 'memory': {
      logger.info('[Storage] Using in-memory storage (data will be lost on restart)');
      adapter = new MemoryPolicyAdapter({ tablePrefix });
      break;
    }

    default: {
      const unknownMode: never = mode;
      throw new Error(`Unknown storage mode: ${String(unknownMode)}`);
    }
  }

  await adapter.initialize();
  return adapter;
}
