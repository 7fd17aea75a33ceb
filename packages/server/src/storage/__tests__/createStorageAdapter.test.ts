import { createStorageAdapter } from '../createStorageAdapter';
import { MemoryPolicyAdapter } from '../MemoryPolicyAdapter';
import { SqlJsPolicyAdapter } from '../SqlJsPolicyAdapter';
import { PostgresPolicyAdapter } from '../PostgresPolicyAdapter';

describe('createStorageAdapter', () => {
  it('should default to in-memory storage', async () => {
    const adapter = await createStorageAdapter(undefined, {});

    expect(adapter).toBeInstanceOf(MemoryPolicyAdapter);
    expect(adapter.tables.subject.name).toBe('acl_policy_subject');
    await adapter.close();
  });

  it('should read the mode and prefix from the environment', async () => {
    const adapter = await createStorageAdapter(undefined, {
      STORAGE_MODE: 'sqlite',
      DB_PATH: ':memory:',
      POLICY_TABLE_PREFIX: 'authz',
    });

    expect(adapter).toBeInstanceOf(SqlJsPolicyAdapter);
    expect(adapter.tables.resource.name).toBe('authz_resource');
    await adapter.close();
  });

  it('should let explicit config win over the environment', async () => {
    const adapter = await createStorageAdapter(
      { mode: 'memory', tablePrefix: 'custom' },
      { STORAGE_MODE: 'sqlite', DB_PATH: ':memory:' }
    );

    expect(adapter).toBeInstanceOf(MemoryPolicyAdapter);
    expect(adapter.tables.permission.name).toBe('custom_permission');
    await adapter.close();
  });

  it('should reject an invalid environment before connecting', async () => {
    await expect(createStorageAdapter(undefined, { STORAGE_MODE: 'postgres' })).rejects.toThrow(
      'Environment validation failed'
    );
  });

  it('should reject an invalid explicit table prefix', async () => {
    await expect(createStorageAdapter({ tablePrefix: 'bad-prefix' }, {})).rejects.toThrow('Invalid table prefix');
  });

  it('should build a PostgreSQL adapter without connecting', async () => {
    const adapter = new PostgresPolicyAdapter({ host: 'localhost', database: 'tessera' }, { tablePrefix: 'authz' });

    expect(adapter.tables.subject.name).toBe('authz_subject');
    await adapter.close();
  });

  it('should not load sql.js through the storage barrel', () => {
    jest.isolateModules(() => {
      jest.doMock('sql.js', () => {
        throw new Error('sql.js loaded');
      });
      const storage: Record<string, unknown> = require('../index');

      expect(storage.createStorageAdapter).toBeDefined();
      expect(storage.MemoryPolicyAdapter).toBeDefined();
      expect('SqlJsPolicyAdapter' in storage).toBe(false);
    });
    jest.dontMock('sql.js');
  });
});
