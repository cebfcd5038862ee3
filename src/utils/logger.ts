import { Logging, LogSync } from '@google-cloud/logging';

export interface LogMetadata {
  requestId?: string;
  correlationId?: string;
  sessionId?: string;
  handle?: string;
  action?: string;
  duration?: number;
  statusCode?: number;
  error?: unknown;
  [key: string]: unknown;
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface StructuredLog {
  timestamp: string;
  level: string;
  message: string;
  metadata?: LogMetadata;
  service: string;
  version: string;
  environment: string;
}

// Keys whose values are credentials and must never reach the log sink in clear.
const SENSITIVE_KEYS = ['token', 'refreshToken', 'accessToken', 'externalTokenKey', 'sessionToken', 'tokenKey'];

function parseLevel(value: string | undefined): LogLevel {
  switch ((value || 'INFO').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

export class EnhancedLogger {
  private googleLogging?: Logging;
  private log?: LogSync;
  private readonly service = 'postlogin-session';
  private readonly version = process.env.npm_package_version || '1.0.0';
  private readonly environment = process.env.NODE_ENV || 'development';
  private logLevel: LogLevel;

  constructor() {
    // Level from LOG_LEVEL, INFO by default
    this.logLevel = parseLevel(process.env.LOG_LEVEL);

    // Cloud Logging only in production; everywhere else the console is the sink
    if (this.environment === 'production') {
      try {
        this.googleLogging = new Logging({
          projectId: process.env.GOOGLE_CLOUD_PROJECT,
        });
        this.log = this.googleLogging.logSync(this.service);
      } catch (error) {
        console.warn('Google Cloud Logging init failed, falling back to console:', error);
      }
    }
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.logLevel !== LogLevel.SILENT && level >= this.logLevel;
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): StructuredLog {
    return {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      metadata: metadata ? this.sanitizeMetadata(metadata) : undefined,
      service: this.service,
      version: this.version,
      environment: this.environment,
    };
  }

  sanitizeMetadata(metadata: LogMetadata): LogMetadata {
    const sanitized: LogMetadata = { ...metadata };

    // Mask credentials
    for (const key of SENSITIVE_KEYS) {
      const value = sanitized[key];
      if (typeof value === 'string') {
        sanitized[key] = maskSensitiveData(value);
      }
    }

    // Serialise Error objects
    if (sanitized.error instanceof Error) {
      sanitized.error = {
        name: sanitized.error.name,
        message: sanitized.error.message,
        stack: sanitized.error.stack,
      };
    }

    return sanitized;
  }

  private writeLog(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const structuredLog = this.formatMessage(level, message, metadata);

    if (this.environment === 'production' && this.log) {
      // Structured entry to Cloud Logging
      try {
        const entry = this.log.entry(
          {
            severity: LogLevel[level],
            timestamp: structuredLog.timestamp,
          },
          structuredLog
        );
        this.log.write(entry);
      } catch (error) {
        // Fall back to the console when Cloud Logging fails
        console.error('Cloud Logging write failed:', error);
        this.writeToConsole(level, structuredLog);
      }
    } else {
      // Console output in development and test
      this.writeToConsole(level, structuredLog);
    }
  }

  private writeToConsole(level: LogLevel, log: StructuredLog): void {
    const output = this.environment === 'development'
      ? `[${log.level}] ${this.addColors(level, log.message)}${log.metadata ? ' ' + JSON.stringify(log.metadata, null, 2) : ''}`
      : JSON.stringify(log);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.log(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      default:
        console.error(output);
        break;
    }
  }

  private addColors(level: LogLevel, message: string): string {
    const colors: Record<number, string> = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
    };
    return `${colors[level] ?? ''}${message}\x1b[0m`;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.writeLog(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.writeLog(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.writeLog(LogLevel.WARN, message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.writeLog(LogLevel.ERROR, message, metadata);
  }

  // Timing helper; the returned function logs the elapsed time
  startTimer(correlationId: string, action: string): () => void {
    const startTime = Date.now();
    return () => {
      this.debug(`Completed: ${action}`, {
        correlationId,
        action,
        duration: Date.now() - startTime,
      });
    };
  }

  // Outbound API request/response logging
  logApiCall(method: string, url: string, statusCode: number, duration: number, metadata?: LogMetadata): void {
    const level = statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO;
    this.writeLog(level, `API call: ${method} ${url} - ${statusCode}`, {
      ...metadata,
      method,
      url,
      statusCode,
      duration,
    });
  }
}

export function maskSensitiveData(data: string): string {
  if (!data || data.length < 8) return '***';
  return `${data.substring(0, 4)}***${data.substring(data.length - 4)}`;
}

// Singleton instance
export const logger = new EnhancedLogger();
