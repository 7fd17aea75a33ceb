export {
  PolicyStoreError,
  NotFoundError,
  CompileError,
  SerializationError,
  BackendError,
  InvalidPolicyError,
  isNotFoundError,
  errorMessage,
} from './errors';
export type { PolicyStoreErrorCode } from './errors';

export {
  compileTemplate,
  compileTemplateOrThrow,
  matchesPattern,
  escapeLiteral,
  codePointLength,
  DEFAULT_START_DELIMITER,
  DEFAULT_END_DELIMITER,
} from './template';
export type { CompileResult } from './template';

export { createPolicy, allowsAccess, templatesFor, isGlobalPolicy } from './policy';
export type { PolicyDimension } from './policy';

export { encodeConditions, decodeConditions } from './conditions';

export * from './schemas';
