/**
 * Structured logging with secret redaction
 *
 * - Never log bearer tokens, client secrets or password credential text
 * - Redact sensitive headers (Authorization, Cookie)
 * - Support JSON lines output for CI/automation
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Pretty print JSON (default: false) */
  prettyPrint?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,

  // JWT access tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Client secrets as issued by the directory (prefix~rest)
  /[a-zA-Z0-9_-]{3}\d~[a-zA-Z0-9_.~-]{30,}/g,

  // client_secret=... in form bodies or query strings
  /client_secret=[^&\s]+/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lowercased) that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'clientsecret',
  'client_secret',
  'secrettext',
  'password',
  'secret',
  'token',
  'authorization',
  'key',
]);

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value, keeping the first and last
 * four characters for debugging
 *
 * @example
 * redactString('Bearer abcdefghij') // 'Bear...ghij'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in a value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();

    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof entry === 'string' && entry.length > 0) {
        result[key] = redactString(entry);
      } else if (entry !== null && entry !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = entry;
      }
    } else {
      result[key] = redactValue(entry, depth + 1);
    }
  }

  return result;
}

/**
 * Redact every value of a context record
 */
export function redactObject(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const redacted = redactValue(context);
  if (typeof redacted === 'object' && redacted !== null) {
    Object.assign(result, redacted);
  }
  return result;
}

/**
 * Redact sensitive headers from a Headers object or plain object
 */
export function redactHeaders(headers: Headers | Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};

  const entries: [string, string][] = [];
  if (headers instanceof Headers) {
    headers.forEach((value, key) => entries.push([key, value]));
  } else {
    entries.push(...Object.entries(headers));
  }

  for (const [key, value] of entries) {
    result[key] = SENSITIVE_HEADERS.has(key.toLowerCase())
      ? redactString(value)
      : redactPatterns(value);
  }

  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly context: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, context: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      prettyPrint: config.prettyPrint ?? false,
    };
    this.context = redactObject(context);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.context, ...(context ? redactObject(context) : {}) };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  format(entry: LogEntry): string {
    if (this.config.json) {
      return this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  // Log lines go to stderr so --json command output on stdout stays parseable
  private output(level: LogLevel, entry: LogEntry): void {
    const formatted = this.format(entry);
    if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.error(formatted);
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.output(level, this.createEntry(level, message, context, error));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(method: string, url: string, options?: { headers?: Headers | Record<string, string> }): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
    });
  }

  /**
   * Log an HTTP response; non-2xx responses are logged at warn
   */
  response(
    status: number,
    url: string,
    options?: { durationMs?: number; errorCode?: string; attempt?: number }
  ): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
      status,
      durationMs: options?.durationMs,
      errorCode: options?.errorCode,
      attempt: options?.attempt,
    });
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.context, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Parse a log level from an environment value
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

/**
 * Default logger instance for the client
 */
export const logger = new ApiLogger({
  level: parseLogLevel(process.env.DIRAPPS_LOG_LEVEL),
  json: process.env.DIRAPPS_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
