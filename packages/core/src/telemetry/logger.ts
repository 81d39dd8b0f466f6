/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Secret/credential redaction (service account keys, bearer tokens)
 * - Consistent field names
 * - Child loggers carrying job context
 *
 * @module @jobgraph/core/telemetry/logger
 */

// =============================================================================
// Severity
// =============================================================================

export const SEVERITIES = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Parse a severity from an environment-style string ("warn", "WARNING", "info").
 * Returns undefined for anything unrecognised.
 */
export function parseSeverity(value: string | undefined): Severity | undefined {
  if (!value) return undefined;
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') return 'WARNING';
  return isSeverity(upper) ? upper : undefined;
}

// =============================================================================
// Logger Configuration
// =============================================================================

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
  /** Custom redaction patterns, applied to every string value */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive data inside string values
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,  // Bearer tokens
  /Authorization:\s*[^\s,;]+/gi,       // Authorization headers
  /dapi[a-f0-9]{32}(-\d+)?/g,          // Workspace personal access tokens

  // Private keys
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Field names whose values are always replaced, wherever they appear
 */
const SENSITIVE_KEY_PATTERN = /(private_key|password|secret|token|api[_-]?key)/i;

const REDACTED = '[REDACTED]';

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

  // Context fields
  jobKey?: string;
  jobName?: string;
  taskName?: string;
  source?: string;
  eventName?: string;

  // Error details
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  // Additional data
  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured JSON logger
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  get minSeverity(): Severity {
    return this.config.minSeverity;
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

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
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('CRITICAL', message, { ...data, ...errorData });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log a configuration document being loaded, at DEBUG
   */
  configLoaded(source: string, jobCount: number, durationMs: number, data?: Record<string, unknown>): void {
    this.debug('Job configuration loaded', {
      eventName: 'config.loaded',
      source,
      jobCount,
      durationMs,
      ...data,
    });
  }

  /**
   * Log the outcome of validating one job
   */
  jobValidated(
    jobKey: string,
    jobName: string,
    valid: boolean,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = valid ? 'DEBUG' : 'WARNING';
    this.log(severity, `Job ${valid ? 'validated' : 'failed validation'}`, {
      eventName: valid ? 'job.valid' : 'job.invalid',
      jobKey,
      jobName,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, data);
    this.output(this.redact(entry));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
    };

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
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

  private redact(entry: LogEntry): LogEntry {
    const redacted: LogEntry = { ...entry };
    for (const [key, value] of Object.entries(entry)) {
      redacted[key] = this.redactValue(value, key);
    }
    return redacted;
  }

  private redactValue(value: unknown, key?: string): unknown {
    if (key !== undefined && SENSITIVE_KEY_PATTERN.test(key) && value !== undefined && value !== null) {
      return REDACTED;
    }
    if (typeof value === 'string') {
      return this.redactString(value);
    }
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item));
    }
    if (typeof value === 'object' && value !== null) {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) {
        out[k] = this.redactValue(v, k);
      }
      return out;
    }
    return value;
  }

  private redactString(value: string): string {
    let redacted = value;
    for (const pattern of this.redactionPatterns) {
      redacted = redacted.replace(pattern, REDACTED);
    }
    return redacted;
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
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
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance, configured from APP_NAME, LOG_LEVEL and NODE_ENV
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'jobgraph',
      minSeverity: parseSeverity(process.env.LOG_LEVEL) ?? 'INFO',
      prettyPrint: process.env.NODE_ENV === 'development',
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger | null): void {
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
