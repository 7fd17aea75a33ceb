export * from './PolicyRepository';
export * from './storage';
export * from './config';
export * from './utils/logger';
