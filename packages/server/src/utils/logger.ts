import pino from 'pino';
import { loadLoggingConfig, LoggingConfig } from '../config/env-schema';

export function createLogger(config: LoggingConfig) {
  return pino({
    name: 'tessera',
    level: config.LOG_LEVEL,
    transport: config.NODE_ENV !== 'production' && config.NODE_ENV !== 'test' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname'
      }
    } : undefined,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  });
}

export const logger = createLogger(loadLoggingConfig(process.env));

export type Logger = typeof logger;
