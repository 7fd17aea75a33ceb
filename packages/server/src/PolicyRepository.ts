import {
  NotFoundError,
  PolicyEffectSchema,
  SerializationError,
  createPolicy,
  decodeConditions,
  encodeConditions,
  isNotFoundError,
} from '@tessera/core';
import type { Policy, PolicyInput } from '@tessera/core';
import { IPolicyStorage } from './storage/IPolicyStorage';
import { linkTablesInOrder } from './storage/LinkTable';
import { logger as defaultLogger, Logger } from './utils/logger';

export interface PolicyRepositoryOptions {
  logger?: Logger;
}

/**
 * Stores policies and resolves which of them apply to a subject.
 *
 * Holds no mutable state of its own; every guarantee about atomicity comes
 * from the storage adapter's transactions, so one instance can serve
 * concurrent callers.
 */
export class PolicyRepository {
  private readonly storage: IPolicyStorage;
  private readonly logger: Logger;

  constructor(storage: IPolicyStorage, options?: PolicyRepositoryOptions) {
    this.storage = storage;
    this.logger = options?.logger ?? defaultLogger;
  }

  /**
   * Writes the policy row and every subject, permission and resource link in
   * one transaction. Templates are compiled before the transaction opens, so
   * a CompileError writes nothing; any insert failure rolls everything back.
   * The first error is rethrown.
   */
  async create(input: PolicyInput): Promise<void> {
    const policy = createPolicy(input);
    const conditions = encodeConditions(policy.conditions);
    const links = linkTablesInOrder(this.storage.tables).map((table) => ({
      table,
      entries: table.entriesFor(policy),
    }));

    await this.storage.transaction(async (tx) => {
      await tx.insertPolicy({
        id: policy.id,
        description: policy.description,
        effect: policy.effect,
        conditions,
      });
      for (const { table, entries } of links) {
        for (const entry of entries) {
          await tx.insertLink(table, entry);
        }
      }
    });

    this.logger.debug({ policyId: policy.id }, 'Policy created');
  }

  /**
   * @throws NotFoundError when no policy has this id
   */
  async get(id: string): Promise<Policy> {
    const row = await this.storage.loadPolicy(id);
    if (!row) {
      throw new NotFoundError(id);
    }

    const effect = PolicyEffectSchema.safeParse(row.effect);
    if (!effect.success) {
      throw new SerializationError(`Policy ${id} has an invalid stored effect "${row.effect}"`);
    }
    const conditions = decodeConditions(row.conditions);

    const { subject, resource, permission } = this.storage.tables;
    const subjects = await this.storage.loadTemplates(subject, id);
    const permissions = await this.storage.loadTemplates(permission, id);
    const resources = await this.storage.loadTemplates(resource, id);

    return createPolicy({
      id: row.id,
      description: row.description,
      effect: effect.data,
      conditions,
      subjects,
      resources,
      permissions,
    });
  }

  /**
   * Link rows go with the policy by cascade. Deleting an unknown id is a no-op.
   */
  async delete(id: string): Promise<void> {
    const removed = await this.storage.deletePolicy(id);
    this.logger.debug({ policyId: id, removed }, 'Policy deleted');
  }

  /**
   * Policies whose subject templates match `subject`, plus every global policy
   * (one without subject templates). Order is unspecified.
   */
  async findBySubject(subject: string): Promise<Policy[]> {
    const matched = await this.storage.findSubjectMatches(subject);
    const globals = await this.storage.findGlobalPolicies();

    const policies: Policy[] = [];
    for (const id of new Set([...matched, ...globals])) {
      try {
        policies.push(await this.get(id));
      } catch (err) {
        // deleted after the id lookup
        if (isNotFoundError(err)) {
          this.logger.debug({ policyId: id }, 'Policy vanished during subject lookup');
          continue;
        }
        throw err;
      }
    }
    return policies;
  }
}
