import { CompileError, createPolicy } from '@tessera/core';
import { LinkTable, createLinkTables, linkTablesInOrder } from '../LinkTable';

describe('LinkTable', () => {
  it('names tables after the prefix and dimension', () => {
    expect(new LinkTable('subject').name).toBe('acl_policy_subject');
    expect(new LinkTable('resource', 'authz').name).toBe('authz_resource');
  });

  it('rejects prefixes that are not plain identifiers', () => {
    expect(() => new LinkTable('subject', 'x; DROP TABLE acl_policy')).toThrow('Invalid table prefix');
    expect(() => new LinkTable('subject', '1policies')).toThrow('Invalid table prefix');
  });

  it('compiles the templates of its own dimension', () => {
    const policy = createPolicy({
      id: 'p1',
      effect: 'allow',
      subjects: ['users:<.+>'],
      resources: ['articles:<[0-9]+>', 'articles:new'],
    });

    expect(new LinkTable('subject').entriesFor(policy)).toEqual([
      { policy: 'p1', template: 'users:<.+>', compiled: '^users:(.+)$' },
    ]);
    expect(new LinkTable('resource').entriesFor(policy)).toEqual([
      { policy: 'p1', template: 'articles:<[0-9]+>', compiled: '^articles:([0-9]+)$' },
      { policy: 'p1', template: 'articles:new', compiled: '^articles:new$' },
    ]);
    expect(new LinkTable('permission').entriesFor(policy)).toEqual([]);
  });

  it('uses the policy delimiters', () => {
    const policy = createPolicy({
      id: 'p1',
      effect: 'allow',
      permissions: ['posts:[create|update]'],
      startDelimiter: '[',
      endDelimiter: ']',
    });

    expect(new LinkTable('permission').entriesFor(policy)).toEqual([
      { policy: 'p1', template: 'posts:[create|update]', compiled: '^posts:(create|update)$' },
    ]);
  });

  it('throws the CompileError of a bad template', () => {
    const policy = createPolicy({ id: 'p1', effect: 'allow', subjects: ['users:<'] });

    expect(() => new LinkTable('subject').entriesFor(policy)).toThrow(CompileError);
  });
});

describe('createLinkTables', () => {
  it('writes subjects, then permissions, then resources', () => {
    expect(linkTablesInOrder(createLinkTables('authz')).map((t) => t.name)).toEqual([
      'authz_subject',
      'authz_permission',
      'authz_resource',
    ]);
  });
});
