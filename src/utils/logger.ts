/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the plugin. All entries include a timestamp and level; context is
 * sanitized so emails and other PII never reach the log stream.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

let minimumLevel: LogLevel = LogLevel.INFO;

/**
 * Base log entry structure
 */
type BaseLogEntry = {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
  user_id?: string;
};

/**
 * Authentication log entry
 */
type AuthenticationLogEntry = BaseLogEntry & {
  log_type: 'AUTHENTICATION';
  success: boolean;
  reason?: string;
  code?: string;
  customer_count?: number;
};

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'email',
  'full_name',
  'name',
  'username',
  'phone',
  'phone_number',
  'authorization',
  'token',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Parse a level name such as `debug` or `WARN`
 */
export function parseLogLevel(value: string): LogLevel {
  const upper = value.trim().toUpperCase();
  if (upper === 'WARNING') {
    return LogLevel.WARN;
  }
  return Object.values(LogLevel).find((level) => level === upper) ?? LogLevel.INFO;
}

/**
 * Set the minimum level written to the log stream
 */
export function setLogLevel(level: LogLevel | string): void {
  minimumLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Write log entry to the console
 */
function writeLog(entry: BaseLogEntry & Record<string, unknown>): void {
  if (!isEnabled(entry.level)) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log authentication attempt
 *
 * Logs both successful and failed token authentications for security
 * monitoring and audit trails.
 *
 * @example
 * ```typescript
 * logAuthentication({
 *   requestId: 'req-123',
 *   success: false,
 *   reason: 'Token has expired',
 *   code: 'TOKEN_EXPIRED'
 * });
 * ```
 */
export function logAuthentication(params: {
  requestId?: string;
  success: boolean;
  userId?: string;
  reason?: string;
  code?: string;
  customerCount?: number;
}): void {
  const entry: AuthenticationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHENTICATION',
    request_id: params.requestId,
    user_id: params.userId,
    success: params.success,
    reason: params.reason === undefined ? undefined : sanitizeString(params.reason),
    code: params.code,
    customer_count: params.customerCount,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * Automatically sanitizes the message and context to remove PII.
 *
 * @example
 * ```typescript
 * log(LogLevel.WARN, 'Key set refresh failed, keeping previous set', {
 *   error: 'timeout of 10000ms exceeded'
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  writeLog({
    timestamp: new Date().toISOString(),
    level,
    message: sanitizeString(message),
    ...sanitizedContext,
  });
}

/**
 * Describe an unknown thrown value for a log entry
 */
export function errorDetails(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
    };
  }
  return { error_message: String(error) };
}
