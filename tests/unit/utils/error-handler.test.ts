import {
  AppError,
  ErrorFactory,
  ErrorHandler,
  ErrorSeverity,
  ErrorType,
  toAppError,
} from '../../../src/utils/error-handler';
import { logger } from '../../../src/utils/logger';

describe('ErrorFactory', () => {
  it.each([
    { error: ErrorFactory.createValidationError('bad'), type: ErrorType.VALIDATION, statusCode: 400, retryable: false },
    { error: ErrorFactory.createConfigurationError('bad'), type: ErrorType.CONFIGURATION, statusCode: 404, retryable: false },
    { error: ErrorFactory.createInvalidTokenError('bad'), type: ErrorType.INVALID_TOKEN, statusCode: 401, retryable: false },
    { error: ErrorFactory.createTokenExpiredError('bad'), type: ErrorType.TOKEN_EXPIRED, statusCode: 401, retryable: false },
    { error: ErrorFactory.createSessionNotFoundError('bad'), type: ErrorType.SESSION_NOT_FOUND, statusCode: 404, retryable: false },
    { error: ErrorFactory.createStaleTokenError('bad'), type: ErrorType.STALE_TOKEN, statusCode: 409, retryable: false },
    {
      error: ErrorFactory.createExternalSessionExpiredError('bad'),
      type: ErrorType.EXTERNAL_SESSION_EXPIRED,
      statusCode: 401,
      retryable: false,
    },
    {
      error: ErrorFactory.createVerificationUnavailableError('bad'),
      type: ErrorType.VERIFICATION_UNAVAILABLE,
      statusCode: 503,
      retryable: true,
    },
    { error: ErrorFactory.createInternalError('bad'), type: ErrorType.INTERNAL, statusCode: 500, retryable: false },
  ])('should build $type with status $statusCode', ({ error, type, statusCode, retryable }) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.type).toBe(type);
    expect(error.statusCode).toBe(statusCode);
    expect(error.retryable).toBe(retryable);
  });

  it('should keep the default user message unless one is supplied', () => {
    expect(ErrorFactory.createValidationError('bad').userMessage).toBe('Request data is invalid.');
    expect(ErrorFactory.createValidationError('bad', 'Customer identity is invalid.').userMessage)
      .toBe('Customer identity is invalid.');
  });

  it('should mark internal errors as non-operational', () => {
    const error = ErrorFactory.createInternalError('boom');

    expect(error.isOperational).toBe(false);
    expect(error.severity).toBe(ErrorSeverity.CRITICAL);
  });
});

describe('ErrorHandler', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('toUserResponse', () => {
    it('should expose the stable code and user message of an AppError', () => {
      const error = ErrorFactory.createStaleTokenError('rid mismatch for session-1');

      expect(ErrorHandler.toUserResponse(error, 'req-1')).toEqual({
        error: 'Refresh token has already been used.',
        code: 'STALE_TOKEN',
        retryable: false,
        requestId: 'req-1',
        timestamp: expect.any(String),
      });
    });

    it('should hide the details of unexpected errors', () => {
      expect(ErrorHandler.toUserResponse(new Error('redis exploded'), 'req-2')).toEqual({
        error: 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        retryable: false,
        requestId: 'req-2',
        timestamp: expect.any(String),
      });
    });
  });

  it('should map status codes', () => {
    expect(ErrorHandler.statusCodeOf(ErrorFactory.createTokenExpiredError('late'))).toBe(401);
    expect(ErrorHandler.statusCodeOf('plain string')).toBe(500);
  });

  describe('logAndMonitor', () => {
    it('should log low severity errors at info', () => {
      const info = jest.spyOn(logger, 'info').mockImplementation(() => undefined);

      ErrorHandler.logAndMonitor(ErrorFactory.createInvalidTokenError('bad signature'), { requestId: 'req-1' });

      expect(info).toHaveBeenCalledWith('Handled error: bad signature', expect.objectContaining({
        requestId: 'req-1',
        errorType: ErrorType.INVALID_TOKEN,
        statusCode: 401,
      }));
    });

    it('should log high severity errors at error with the cause', () => {
      const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
      const cause = new Error('socket hang up');

      ErrorHandler.logAndMonitor(ErrorFactory.createVerificationUnavailableError('verifier down', undefined, cause));

      expect(error).toHaveBeenCalledWith('Severe error: verifier down', expect.objectContaining({
        retryable: true,
        error: cause,
      }));
    });

    it('should log foreign errors as unhandled', () => {
      const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);

      ErrorHandler.logAndMonitor(new Error('boom'));

      expect(error).toHaveBeenCalledWith('Unhandled error: boom', expect.objectContaining({
        errorType: ErrorType.INTERNAL,
      }));
    });
  });
});

describe('toAppError', () => {
  it('should pass AppErrors through', () => {
    const original = ErrorFactory.createSessionNotFoundError('gone');

    expect(toAppError(original, 'loading')).toBe(original);
  });

  it('should wrap anything else as an internal error', () => {
    const cause = new Error('Connection is closed.');
    const wrapped = toAppError(cause, 'Error loading session', { sessionId: 's-1' });

    expect(wrapped.type).toBe(ErrorType.INTERNAL);
    expect(wrapped.message).toBe('Error loading session: Connection is closed.');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.metadata).toEqual({ sessionId: 's-1', context: 'Error loading session' });
  });
});
