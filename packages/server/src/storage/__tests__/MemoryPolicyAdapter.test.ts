import { BackendError } from '@tessera/core';
import { MemoryPolicyAdapter } from '../MemoryPolicyAdapter';

describe('MemoryPolicyAdapter', () => {
  let adapter: MemoryPolicyAdapter;

  beforeEach(async () => {
    adapter = new MemoryPolicyAdapter();
    await adapter.initialize();
  });

  afterEach(async () => {
    await adapter.close();
  });

  const row = { id: 'p1', description: '', effect: 'allow' as const, conditions: '[]' };

  it('hides staged writes until commit', async () => {
    let seenInside: unknown = 'unset';

    await adapter.transaction(async (tx) => {
      await tx.insertPolicy(row);
      await tx.insertLink(adapter.tables.subject, { policy: 'p1', template: 'users:alice', compiled: '^users:alice$' });
      seenInside = await adapter.loadPolicy('p1');
    });

    expect(seenInside).toBeUndefined();
    expect(await adapter.loadPolicy('p1')).toEqual(row);
    expect(await adapter.loadTemplates(adapter.tables.subject, 'p1')).toEqual(['users:alice']);
  });

  it('discards staged writes on failure', async () => {
    await expect(
      adapter.transaction(async (tx) => {
        await tx.insertPolicy(row);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await adapter.loadPolicy('p1')).toBeUndefined();
  });

  it('rejects links to a policy that does not exist', async () => {
    await expect(
      adapter.transaction(async (tx) => {
        await tx.insertLink(adapter.tables.resource, { policy: 'nobody', template: 'a', compiled: '^a$' });
      })
    ).rejects.toBeInstanceOf(BackendError);
  });

  it('cascades deletes and reports removed rows', async () => {
    await adapter.transaction(async (tx) => {
      await tx.insertPolicy(row);
      await tx.insertLink(adapter.tables.permission, { policy: 'p1', template: 'view', compiled: '^view$' });
    });

    expect(await adapter.deletePolicy('p1')).toBe(1);
    expect(await adapter.deletePolicy('p1')).toBe(0);
    expect(await adapter.loadTemplates(adapter.tables.permission, 'p1')).toEqual([]);
  });

  it('separates subject matches from global policies', async () => {
    await adapter.transaction(async (tx) => {
      await tx.insertPolicy(row);
      await tx.insertLink(adapter.tables.subject, { policy: 'p1', template: 'users:<.+>', compiled: '^users:(.+)$' });
      await tx.insertPolicy({ ...row, id: 'global' });
    });

    expect(await adapter.findSubjectMatches('users:alice')).toEqual(['p1']);
    expect(await adapter.findSubjectMatches('groups:alice')).toEqual([]);
    expect(await adapter.findGlobalPolicies()).toEqual(['global']);
  });
});
