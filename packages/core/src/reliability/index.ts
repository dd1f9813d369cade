/**
 * Error taxonomy and exit-code mapping
 *
 * @module @recstat/core/reliability
 */

export {
  type RecorderErrorCode,
  RecorderError,
  UnknownTableError,
  CsvStructureError,
  ExecutionFailedError,
  DatabaseUnavailableError,
  ConfigurationError,
  toExitCode,
  wrapError,
} from './errors.js';
