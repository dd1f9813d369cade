/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Severity filtering
 * - Credential redaction for database URLs
 * - Consistent field names
 *
 * Every entry goes to stderr. Commands print their own results (CSV, SQL,
 * tables) on stdout, and diagnostics must never interleave with them.
 *
 * @module @recstat/core/telemetry/logger
 */

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Severity levels
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR';

export const SEVERITIES: readonly Severity[] = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR'];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  // user:password@ in connection URLs
  /(?<=:\/\/[^:/@\s"]+:)[^@\s"]+(?=@)/g,
  // password=..., "password":"..."
  /(?<=password['"]?\s*[=:]\s*['"]?)[^'"\s,}{]+/gi,
];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
};

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'INFO',
      prettyPrint: config.prettyPrint ?? false,
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log job processing start
   */
  jobStart(jobType: string, data?: Record<string, unknown>): void {
    this.info('Job started', {
      eventName: 'job.start',
      jobType,
      ...data,
    });
  }

  /**
   * Log job processing end
   */
  jobEnd(jobType: string, success: boolean, durationMs: number, data?: Record<string, unknown>): void {
    this.log(success ? 'INFO' : 'ERROR', `Job ${success ? 'completed' : 'failed'}`, {
      eventName: success ? 'job.success' : 'job.failure',
      jobType,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.config.minSeverity];
  }

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
      ...data,
    };

    this.output(this.redact(entry));
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): string {
    let json = this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);

    for (const pattern of this.redactionPatterns) {
      json = json.replace(pattern, '[REDACTED]');
    }

    return json;
  }

  private output(line: string): void {
    console.error(line);
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL?.toUpperCase();
    defaultLogger = new Logger({
      serviceName: 'recstat',
      minSeverity: level && isSeverity(level) ? level : 'WARNING',
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    ...config,
    serviceName,
  });
}
