/**
 * Server Configuration exports
 */

export { loadConfig, loadLoggingConfig, type EnvConfig, type LoggingConfig } from './env-schema';
