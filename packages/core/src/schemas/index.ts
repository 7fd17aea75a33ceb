// packages/core/src/schemas/index.ts

// Policy, effect and condition descriptor schemas
export * from './policy-schemas';
