import type { PolicyEffect } from '@tessera/core';
import type { LinkEntry, LinkTable, LinkTables } from './LinkTable';

/**
 * A policy row as written. `conditions` is the encoded JSON blob.
 */
export interface PolicyRow {
  id: string;
  description: string;
  effect: PolicyEffect;
  conditions: string;
}

/**
 * A policy row as read back. Drivers differ in what they return for the
 * conditions column (text or parsed JSON), so it stays `unknown` until the
 * repository decodes it.
 */
export type StoredPolicyRow = {
  id: string;
  description: string;
  effect: string;
  conditions: unknown;
};

/**
 * Writes available inside a transaction. Nothing written here is visible to
 * other operations until the transaction commits.
 */
export interface IPolicyTransaction {
  insertPolicy(row: PolicyRow): Promise<void>;
  insertLink(table: LinkTable, entry: LinkEntry): Promise<void>;
}

/**
 * Policy persistence interface.
 *
 * Every adapter provides the same table layout: one policy table keyed by id
 * and one link table per dimension keyed by (template, policy), whose rows are
 * removed together with their policy.
 */
export interface IPolicyStorage {
  /**
   * The link tables this adapter reads and writes.
   */
  readonly tables: LinkTables;

  /**
   * Provision the schema and open connections.
   */
  initialize(): Promise<void>;

  close(): Promise<void>;

  /**
   * Runs `work` in a transaction. Commits when it resolves; rolls back when
   * it throws, then rethrows. A failed rollback is reported as a
   * BackendError carrying both errors.
   */
  transaction<T>(work: (tx: IPolicyTransaction) => Promise<T>): Promise<T>;

  /**
   * Returns undefined when no row has this id.
   */
  loadPolicy(id: string): Promise<StoredPolicyRow | undefined>;

  loadTemplates(table: LinkTable, policyId: string): Promise<string[]>;

  /**
   * Deletes the policy and, by cascade, its link rows. Returns the number of
   * policy rows removed.
   */
  deletePolicy(id: string): Promise<number>;

  /**
   * Ids of policies with at least one subject pattern matching the whole of
   * `subject`.
   */
  findSubjectMatches(subject: string): Promise<string[]>;

  /**
   * Ids of policies that have no subject rows at all.
   */
  findGlobalPolicies(): Promise<string[]>;
}
