import { BackendError } from '@tessera/core';
import { logger } from '../utils/logger';
import { IPolicyStorage, IPolicyTransaction, PolicyRow, StoredPolicyRow } from './IPolicyStorage';
import { DEFAULT_TABLE_PREFIX, LinkEntry, LinkTable, LinkTables, createLinkTables, linkTablesInOrder } from './LinkTable';
import { PatternCache } from './PatternCache';
import { runTransaction } from './transaction';

interface StagedLink {
  table: LinkTable;
  entry: LinkEntry;
}

/**
 * In-memory implementation of IPolicyStorage.
 * Useful for development, testing, and demos without requiring a database.
 *
 * Transactions stage their writes and apply them in one step at commit, after
 * checking the same constraints a database would (unique id, unique template
 * per policy, existing parent policy).
 *
 * Note: Data is lost when the process exits.
 */
export class MemoryPolicyAdapter implements IPolicyStorage {
  readonly tables: LinkTables;
  private policies = new Map<string, PolicyRow>();
  // Map<tableName, Map<policyId, Map<template, LinkEntry>>>
  private links = new Map<string, Map<string, Map<string, LinkEntry>>>();
  private patterns = new PatternCache();

  constructor(options?: { tablePrefix?: string }) {
    this.tables = createLinkTables(options?.tablePrefix ?? DEFAULT_TABLE_PREFIX);
    for (const table of linkTablesInOrder(this.tables)) {
      this.links.set(table.name, new Map());
    }
  }

  async initialize(): Promise<void> {
    logger.info('[MemoryPolicyAdapter] Initialized in-memory storage');
  }

  async close(): Promise<void> {
    this.policies.clear();
    for (const byPolicy of this.links.values()) {
      byPolicy.clear();
    }
    logger.info('[MemoryPolicyAdapter] Storage cleared and closed');
  }

  async transaction<T>(work: (tx: IPolicyTransaction) => Promise<T>): Promise<T> {
    let stagedPolicies: PolicyRow[] = [];
    let stagedLinks: StagedLink[] = [];

    const tx: IPolicyTransaction = {
      insertPolicy: async (row) => {
        this.checkPolicy(row, stagedPolicies);
        stagedPolicies.push({ ...row });
      },
      insertLink: async (table, entry) => {
        this.checkLink(table, entry, stagedPolicies, stagedLinks);
        stagedLinks.push({ table, entry: { ...entry } });
      },
    };

    return runTransaction(
      {
        begin: async () => {},
        commit: async () => {
          // re-check: another transaction may have committed since the insert
          const policies: PolicyRow[] = [];
          for (const row of stagedPolicies) {
            this.checkPolicy(row, policies);
            policies.push(row);
          }
          const links: StagedLink[] = [];
          for (const link of stagedLinks) {
            this.checkLink(link.table, link.entry, policies, links);
            links.push(link);
          }
          for (const row of policies) {
            this.policies.set(row.id, row);
          }
          for (const { table, entry } of links) {
            this.linksOf(table, entry.policy, true).set(entry.template, entry);
          }
        },
        rollback: async () => {
          stagedPolicies = [];
          stagedLinks = [];
        },
      },
      () => work(tx)
    );
  }

  async loadPolicy(id: string): Promise<StoredPolicyRow | undefined> {
    const row = this.policies.get(id);
    return row ? { ...row } : undefined;
  }

  async loadTemplates(table: LinkTable, policyId: string): Promise<string[]> {
    return Array.from(this.linksOf(table, policyId, false)?.keys() ?? []);
  }

  async deletePolicy(id: string): Promise<number> {
    if (!this.policies.delete(id)) return 0;
    for (const byPolicy of this.links.values()) {
      byPolicy.delete(id);
    }
    return 1;
  }

  async findSubjectMatches(subject: string): Promise<string[]> {
    const ids: string[] = [];
    for (const [policyId, entries] of this.tableOf(this.tables.subject)) {
      for (const entry of entries.values()) {
        if (this.patterns.test(entry.compiled, subject)) {
          ids.push(policyId);
          break;
        }
      }
    }
    return ids;
  }

  async findGlobalPolicies(): Promise<string[]> {
    const subjects = this.tableOf(this.tables.subject);
    return Array.from(this.policies.keys()).filter((id) => (subjects.get(id)?.size ?? 0) === 0);
  }

  private checkPolicy(row: PolicyRow, staged: PolicyRow[]): void {
    if (this.policies.has(row.id) || staged.some((p) => p.id === row.id)) {
      throw new BackendError(`Duplicate key: policy ${row.id} already exists`);
    }
  }

  private checkLink(table: LinkTable, entry: LinkEntry, stagedPolicies: PolicyRow[], stagedLinks: StagedLink[]): void {
    if (!this.policies.has(entry.policy) && !stagedPolicies.some((p) => p.id === entry.policy)) {
      throw new BackendError(`Foreign key violation: policy ${entry.policy} does not exist`);
    }
    const duplicate =
      this.linksOf(table, entry.policy, false)?.has(entry.template) ||
      stagedLinks.some(
        (l) => l.table.name === table.name && l.entry.policy === entry.policy && l.entry.template === entry.template
      );
    if (duplicate) {
      throw new BackendError(`Duplicate key: ${table.name} (${entry.template}, ${entry.policy}) already exists`);
    }
  }

  private tableOf(table: LinkTable): Map<string, Map<string, LinkEntry>> {
    const byPolicy = this.links.get(table.name);
    if (!byPolicy) {
      throw new BackendError(`Unknown link table ${table.name}`);
    }
    return byPolicy;
  }

  private linksOf(table: LinkTable, policyId: string, create: true): Map<string, LinkEntry>;
  private linksOf(table: LinkTable, policyId: string, create: false): Map<string, LinkEntry> | undefined;
  private linksOf(table: LinkTable, policyId: string, create: boolean): Map<string, LinkEntry> | undefined {
    const byPolicy = this.tableOf(table);
    let entries = byPolicy.get(policyId);
    if (!entries && create) {
      entries = new Map();
      byPolicy.set(policyId, entries);
    }
    return entries;
  }
}
