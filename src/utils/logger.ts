type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Simple structured logger with redaction of device tokens and credentials
 */
class Logger {
  private level: LogLevel;
  private sensitiveFields = ['password', 'token', 'secret', 'authorization', 'registrationid', 'apikey'];

  constructor() {
    const configured = process.env.LOG_LEVEL;
    this.level = isLogLevel(configured) ? configured : 'info';
  }

  private redactValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item));
    }
    if (typeof value === 'object' && value !== null && !(value instanceof Date)) {
      return this.redactSensitive(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }

  private redactSensitive(context: LogContext): LogContext {
    const redacted: LogContext = {};

    for (const [key, value] of Object.entries(context)) {
      if (this.sensitiveFields.some(field => key.toLowerCase().includes(field))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = this.redactValue(value);
      }
    }

    return redacted;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.redactSensitive(context || {}),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else {
      console.warn(JSON.stringify(logEntry));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const logger = new Logger();
