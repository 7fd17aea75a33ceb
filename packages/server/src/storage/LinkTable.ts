import { compileTemplateOrThrow, templatesFor } from '@tessera/core';
import type { Policy, PolicyDimension } from '@tessera/core';

export const DEFAULT_TABLE_PREFIX = 'acl_policy';
const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function validateTablePrefix(prefix: string): void {
  if (!TABLE_NAME_REGEX.test(prefix)) {
    throw new Error(
      `Invalid table prefix "${prefix}". It must start with a letter or underscore and contain only alphanumeric characters and underscores.`
    );
  }
}

/**
 * One stored association between a policy and a template of one dimension.
 */
export interface LinkEntry {
  policy: string;
  template: string;
  compiled: string;
}

/**
 * Link table for one dimension (subjects, resources or permissions).
 * All three share the same columns: template, compiled and policy.
 */
export class LinkTable {
  readonly dimension: PolicyDimension;
  readonly name: string;

  constructor(dimension: PolicyDimension, tablePrefix: string = DEFAULT_TABLE_PREFIX) {
    validateTablePrefix(tablePrefix);
    this.dimension = dimension;
    this.name = `${tablePrefix}_${dimension}`;
  }

  templatesOf(policy: Policy): string[] {
    return templatesFor(policy, this.dimension);
  }

  /**
   * Compiles every template of this dimension with the policy's delimiters.
   * Throws the CompileError of the first template that does not compile.
   */
  entriesFor(policy: Policy): LinkEntry[] {
    return this.templatesOf(policy).map((template) => ({
      policy: policy.id,
      template,
      compiled: compileTemplateOrThrow(template, policy.startDelimiter, policy.endDelimiter),
    }));
  }
}

export interface LinkTables {
  subject: LinkTable;
  permission: LinkTable;
  resource: LinkTable;
}

export function createLinkTables(tablePrefix: string = DEFAULT_TABLE_PREFIX): LinkTables {
  return {
    subject: new LinkTable('subject', tablePrefix),
    permission: new LinkTable('permission', tablePrefix),
    resource: new LinkTable('resource', tablePrefix),
  };
}

/**
 * Write order used when creating a policy.
 */
export function linkTablesInOrder(tables: LinkTables): LinkTable[] {
  return [tables.subject, tables.permission, tables.resource];
}
