/**
 * Telemetry Module
 *
 * Structured JSON logging with credential redaction.
 *
 * @module @recstat/core/telemetry
 */

export {
  type Severity,
  type LoggerConfig,
  type LogEntry,
  SEVERITIES,
  isSeverity,
  Logger,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
