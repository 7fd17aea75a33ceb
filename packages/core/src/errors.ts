/**
 * Error taxonomy shared by the policy model and every storage adapter.
 */

export type PolicyStoreErrorCode =
  | 'NOT_FOUND'
  | 'COMPILE_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'BACKEND_ERROR'
  | 'INVALID_POLICY';

/**
 * Base error class for policy store errors
 */
export class PolicyStoreError extends Error {
  public readonly code: PolicyStoreErrorCode;

  constructor(code: PolicyStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PolicyStoreError';
    this.code = code;
    // Maintain proper stack trace in V8
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Thrown when a lookup finds no row
 */
export class NotFoundError extends PolicyStoreError {
  public readonly id: string;

  constructor(id: string) {
    super('NOT_FOUND', `Policy ${id} not found`);
    this.name = 'NotFoundError';
    this.id = id;
  }
}

/**
 * Thrown when a template has unbalanced delimiters or an invalid fragment
 */
export class CompileError extends PolicyStoreError {
  public readonly template: string;

  constructor(template: string, reason: string, options?: { cause?: unknown }) {
    super('COMPILE_ERROR', `Cannot compile template "${template}": ${reason}`, options);
    this.name = 'CompileError';
    this.template = template;
  }
}

/**
 * Thrown when the conditions blob cannot be encoded or decoded
 */
export class SerializationError extends PolicyStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERIALIZATION_ERROR', message, options);
    this.name = 'SerializationError';
  }
}

/**
 * Wraps any other storage failure. When a rollback fails after the original
 * error, both are kept: the original as `cause`, the rollback failure as
 * `rollbackError`.
 */
export class BackendError extends PolicyStoreError {
  public readonly rollbackError?: unknown;

  constructor(message: string, options?: { cause?: unknown; rollbackError?: unknown }) {
    super('BACKEND_ERROR', message, { cause: options?.cause });
    this.name = 'BackendError';
    this.rollbackError = options?.rollbackError;
  }
}

export class InvalidPolicyError extends PolicyStoreError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_POLICY', `Invalid policy:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'InvalidPolicyError';
    this.issues = issues;
  }
}

export function isNotFoundError(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
