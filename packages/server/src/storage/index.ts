export * from './IPolicyStorage';
export * from './LinkTable';
export * from './PatternCache';
export { runTransaction, toBackendError, type TransactionControl } from './transaction';
export * from './MemoryPolicyAdapter';
export * from './PostgresPolicyAdapter';
// value export stays out of the barrel so sql.js loads only when SQLite is used
export type { SqlJsPolicyAdapter, SqlJsPolicyConfig } from './SqlJsPolicyAdapter';
export * from './createStorageAdapter';
