import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { SERVICE_NAME, SERVICE_VERSION } from '../config/constants.js';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  serviceName?: string;
  base?: Record<string, unknown>;
  destination?: DestinationStream; // defaults to stdout
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      service: config.serviceName ?? SERVICE_NAME,
      version: SERVICE_VERSION,
      ...config.base,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ['token', 'access_token', 'id_token', 'secret', '*.token', '*.access_token', '*.secret'],
      censor: '[redacted]',
    },
  };

  return config.destination ? pino(options, config.destination) : pino(options);
}
