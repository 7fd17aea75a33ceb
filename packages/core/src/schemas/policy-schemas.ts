// packages/core/src/schemas/policy-schemas.ts
import { z } from 'zod';
import { DEFAULT_END_DELIMITER, DEFAULT_START_DELIMITER, codePointLength } from '../template';

// --- Effect ---

export const PolicyEffectSchema = z.enum(['allow', 'deny']);
export type PolicyEffect = z.infer<typeof PolicyEffectSchema>;

// --- Conditions ---

/**
 * Condition descriptor. Stored as part of an opaque JSON blob; evaluating it
 * is the decision layer's job.
 */
export const PolicyConditionSchema = z.object({
  op: z.string().min(1),
  options: z.record(z.unknown()).optional(),
});
export type PolicyCondition = z.infer<typeof PolicyConditionSchema>;

export const PolicyConditionsSchema = z.array(PolicyConditionSchema);

// --- Policy ---

const DelimiterSchema = z
  .string()
  .refine((d) => codePointLength(d) === 1, 'delimiter must be a single character');

export const PolicyInputSchema = z
  .object({
    id: z.string().min(1),
    description: z.string().default(''),
    effect: PolicyEffectSchema,
    conditions: PolicyConditionsSchema.default([]),
    subjects: z.array(z.string()).default([]),
    resources: z.array(z.string()).default([]),
    permissions: z.array(z.string()).default([]),
    startDelimiter: DelimiterSchema.default(DEFAULT_START_DELIMITER),
    endDelimiter: DelimiterSchema.default(DEFAULT_END_DELIMITER),
  })
  .refine((p) => p.startDelimiter !== p.endDelimiter, {
    message: 'start and end delimiters must differ',
    path: ['endDelimiter'],
  });

/** What callers pass in: everything but `id` and `effect` is optional. */
export type PolicyInput = z.input<typeof PolicyInputSchema>;
/** A validated policy with every default filled in. */
export type Policy = z.output<typeof PolicyInputSchema>;
