import { SerializationError, errorMessage } from './errors';
import { PolicyConditionsSchema } from './schemas/policy-schemas';
import type { PolicyCondition } from './schemas/policy-schemas';

const EMPTY_CONDITIONS = '[]';

/**
 * Encodes conditions to the persisted JSON form. Absent or empty
 * conditions become `[]`, never `null`.
 */
export function encodeConditions(conditions: readonly PolicyCondition[] | undefined): string {
  if (!conditions || conditions.length === 0) return EMPTY_CONDITIONS;

  const parsed = PolicyConditionsSchema.safeParse(conditions);
  if (!parsed.success) {
    throw new SerializationError(`Invalid conditions: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  try {
    return JSON.stringify(parsed.data);
  } catch (err) {
    throw new SerializationError(`Cannot encode conditions: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Decodes a persisted conditions blob. Accepts JSON text (SQLite, memory)
 * or the value a driver already parsed (PostgreSQL JSONB).
 */
export function decodeConditions(raw: unknown): PolicyCondition[] {
  if (raw === null || raw === undefined) return [];

  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new SerializationError(`Cannot decode conditions: ${errorMessage(err)}`, { cause: err });
    }
  }

  const parsed = PolicyConditionsSchema.safeParse(value);
  if (!parsed.success) {
    throw new SerializationError(`Invalid stored conditions: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}
