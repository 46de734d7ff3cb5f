export { createLogger, type Logger, type LoggerConfig, type LogLevel } from './logger.js';
export {
  PinoSecurityEventSink,
  type SecurityEvent,
  type SecurityEventSink,
  type TokenRejectionReason,
} from './security-events.js';
