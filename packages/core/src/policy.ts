import { InvalidPolicyError } from './errors';
import { PolicyInputSchema } from './schemas/policy-schemas';
import type { Policy, PolicyInput } from './schemas/policy-schemas';

export type PolicyDimension = 'subject' | 'resource' | 'permission';

/**
 * Validates a policy and fills in defaults (empty description, no
 * conditions, `<`/`>` delimiters). A missing or unknown effect is rejected;
 * there is no implicit allow or deny.
 */
export function createPolicy(input: PolicyInput): Policy {
  const result = PolicyInputSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidPolicyError(
      result.error.issues.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    );
  }
  return result.data;
}

export function allowsAccess(policy: Pick<Policy, 'effect'>): boolean {
  return policy.effect === 'allow';
}

export function templatesFor(policy: Policy, dimension: PolicyDimension): string[] {
  switch (dimension) {
    case 'subject':
      return policy.subjects;
    case 'resource':
      return policy.resources;
    case 'permission':
      return policy.permissions;
  }
}

/**
 * A policy without subject templates applies to every subject.
 */
export function isGlobalPolicy(policy: Pick<Policy, 'subjects'>): boolean {
  return policy.subjects.length === 0;
}
