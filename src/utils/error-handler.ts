import { logger, LogMetadata } from './logger';

/**
 * Stable error codes returned to callers. Clients branch on these to decide
 * between retrying and re-authenticating, so they must never change.
 */
export enum ErrorType {
  VALIDATION = 'VALIDATION_ERROR',
  CONFIGURATION = 'CONFIGURATION_ERROR',
  INVALID_TOKEN = 'INVALID_TOKEN',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  STALE_TOKEN = 'STALE_TOKEN',
  EXTERNAL_SESSION_EXPIRED = 'EXTERNAL_SESSION_EXPIRED',
  VERIFICATION_UNAVAILABLE = 'VERIFICATION_UNAVAILABLE',
  NOT_FOUND = 'NOT_FOUND_ERROR',
  INTERNAL = 'INTERNAL_ERROR',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface AppErrorOptions {
  statusCode?: number;
  severity?: ErrorSeverity;
  retryable?: boolean;
  isOperational?: boolean;
  metadata?: LogMetadata;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly type: ErrorType;
  public readonly statusCode: number;
  public readonly userMessage: string;
  public readonly severity: ErrorSeverity;
  public readonly retryable: boolean;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly metadata?: LogMetadata;

  constructor(type: ErrorType, message: string, userMessage: string, options: AppErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);

    this.name = 'AppError';
    this.type = type;
    this.statusCode = options.statusCode ?? 500;
    this.userMessage = userMessage;
    this.severity = options.severity ?? ErrorSeverity.MEDIUM;
    this.retryable = options.retryable ?? false;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date();
    this.metadata = options.metadata;

    // Capture the V8 stack trace
    Error.captureStackTrace(this, AppError);
  }
}

export const ErrorMessages = {
  // Input validation
  INVALID_INPUT: 'Request data is invalid.',
  INVALID_IDENTITY: 'Customer identity is invalid.',
  UNKNOWN_CHANNEL: 'Channel is not configured.',
  // Tokens and sessions
  INVALID_TOKEN: 'Invalid token.',
  TOKEN_EXPIRED: 'Token has expired.',
  SESSION_NOT_FOUND: 'Session not found.',
  STALE_TOKEN: 'Refresh token has already been used.',
  // External verification
  EXTERNAL_SESSION_EXPIRED: 'External session has expired. Please sign in again.',
  VERIFICATION_UNAVAILABLE: 'Session verification is temporarily unavailable. Please retry.',
  // General
  NOT_FOUND: 'The requested resource was not found.',
  INTERNAL_SERVER_ERROR: 'Internal Server Error',
} as const;

export class ErrorFactory {
  /**
   * Malformed or incomplete input (400).
   */
  static createValidationError(message: string, userMessage?: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.VALIDATION, message, userMessage || ErrorMessages.INVALID_INPUT, {
      statusCode: 400,
      severity: ErrorSeverity.LOW,
      metadata,
    });
  }

  /**
   * Channel or business unit the service is not configured for (404).
   */
  static createConfigurationError(message: string, userMessage?: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.CONFIGURATION, message, userMessage || ErrorMessages.UNKNOWN_CHANNEL, {
      statusCode: 404,
      severity: ErrorSeverity.MEDIUM,
      metadata,
    });
  }

  static createInvalidTokenError(message: string, metadata?: LogMetadata, cause?: unknown): AppError {
    return new AppError(ErrorType.INVALID_TOKEN, message, ErrorMessages.INVALID_TOKEN, {
      statusCode: 401,
      severity: ErrorSeverity.LOW,
      metadata,
      cause,
    });
  }

  static createTokenExpiredError(message: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.TOKEN_EXPIRED, message, ErrorMessages.TOKEN_EXPIRED, {
      statusCode: 401,
      severity: ErrorSeverity.LOW,
      metadata,
    });
  }

  static createSessionNotFoundError(message: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.SESSION_NOT_FOUND, message, ErrorMessages.SESSION_NOT_FOUND, {
      statusCode: 404,
      severity: ErrorSeverity.LOW,
      metadata,
    });
  }

  /**
   * Refresh token already rotated away, or lost a compare-and-swap race.
   */
  static createStaleTokenError(message: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.STALE_TOKEN, message, ErrorMessages.STALE_TOKEN, {
      statusCode: 409,
      severity: ErrorSeverity.MEDIUM,
      metadata,
    });
  }

  static createExternalSessionExpiredError(message: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.EXTERNAL_SESSION_EXPIRED, message, ErrorMessages.EXTERNAL_SESSION_EXPIRED, {
      statusCode: 401,
      severity: ErrorSeverity.LOW,
      metadata,
    });
  }

  /**
   * The external authority gave no verdict. The only retryable error.
   */
  static createVerificationUnavailableError(message: string, metadata?: LogMetadata, cause?: unknown): AppError {
    return new AppError(ErrorType.VERIFICATION_UNAVAILABLE, message, ErrorMessages.VERIFICATION_UNAVAILABLE, {
      statusCode: 503,
      severity: ErrorSeverity.HIGH,
      retryable: true,
      metadata,
      cause,
    });
  }

  static createNotFoundError(message: string, metadata?: LogMetadata): AppError {
    return new AppError(ErrorType.NOT_FOUND, message, ErrorMessages.NOT_FOUND, {
      statusCode: 404,
      severity: ErrorSeverity.LOW,
      metadata,
    });
  }

  /**
   * Unexpected failure; details stay in the logs.
   */
  static createInternalError(message: string, metadata?: LogMetadata, cause?: unknown): AppError {
    return new AppError(ErrorType.INTERNAL, message, ErrorMessages.INTERNAL_SERVER_ERROR, {
      statusCode: 500,
      severity: ErrorSeverity.CRITICAL,
      isOperational: false,
      metadata,
      cause,
    });
  }
}

export interface ErrorResponseBody {
  error: string;
  code: ErrorType;
  retryable: boolean;
  requestId?: string;
  timestamp: string;
}

export class ErrorHandler {
  static logAndMonitor(error: unknown, metadata?: LogMetadata): void {
    const logMetadata: LogMetadata = { ...metadata };

    if (error instanceof AppError) {
      logMetadata.errorType = error.type;
      logMetadata.severity = error.severity;
      logMetadata.statusCode = error.statusCode;
      logMetadata.retryable = error.retryable;
      Object.assign(logMetadata, error.metadata);

      // Log level follows severity
      switch (error.severity) {
        case ErrorSeverity.LOW:
          logger.info(`Handled error: ${error.message}`, logMetadata);
          break;
        case ErrorSeverity.MEDIUM:
          logger.warn(`Warning: ${error.message}`, logMetadata);
          break;
        case ErrorSeverity.HIGH:
        case ErrorSeverity.CRITICAL:
          logger.error(`Severe error: ${error.message}`, { ...logMetadata, error: error.cause ?? error });
          break;
      }
      return;
    }

    // Anything else is reported as an internal error
    logger.error(`Unhandled error: ${error instanceof Error ? error.message : String(error)}`, {
      ...logMetadata,
      errorType: ErrorType.INTERNAL,
      severity: ErrorSeverity.CRITICAL,
      error,
    });
  }

  /**
   * Response body sent to clients. Internal messages never leave the service.
   */
  static toUserResponse(error: unknown, requestId?: string): ErrorResponseBody {
    const timestamp = new Date().toISOString();

    if (error instanceof AppError) {
      return {
        error: error.userMessage,
        code: error.type,
        retryable: error.retryable,
        requestId,
        timestamp,
      };
    }

    // Foreign errors get the generic message
    return {
      error: ErrorMessages.INTERNAL_SERVER_ERROR,
      code: ErrorType.INTERNAL,
      retryable: false,
      requestId,
      timestamp,
    };
  }

  static statusCodeOf(error: unknown): number {
    return error instanceof AppError ? error.statusCode : 500;
  }
}

/**
 * Normalises a thrown value: AppErrors pass through untouched, anything else
 * becomes a generic internal error that keeps the original as its cause.
 */
export function toAppError(error: unknown, context: string, metadata?: LogMetadata): AppError {
  if (error instanceof AppError) {
    return error;
  }

  return ErrorFactory.createInternalError(
    `${context}: ${error instanceof Error ? error.message : String(error)}`,
    { ...metadata, context },
    error
  );
}
