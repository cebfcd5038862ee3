import Joi from 'joi';
import { ErrorFactory } from '../utils/error-handler';
import { logger } from '../utils/logger';

export interface VerificationResult {
  valid: boolean;
}

/**
 * Confirms with the external authority that a session's external token is
 * still live. A definitive verdict resolves; failing to obtain one rejects
 * with VERIFICATION_UNAVAILABLE and is never reported as `valid: false`.
 */
export interface ExternalVerifier {
  verify(sessionToken: string, userId: string, correlationId: string): Promise<VerificationResult>;
}

export interface HttpVerifierConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export interface ValidateSessionResponse {
  status: string;
  data: {
    isExpire: boolean;
    userId?: string;
    sessionToken?: string;
    validatedAt?: string;
  };
  message?: string;
}

export const VALIDATE_SESSION_PATH = '/corporate/relationship-management/marketing/v1/customer/validate-session';

const validateSessionResponseSchema = Joi.object<ValidateSessionResponse>({
  status: Joi.string().required(),
  data: Joi.object({
    isExpire: Joi.boolean().strict().required(),
    userId: Joi.string().allow('').optional(),
    sessionToken: Joi.string().allow('').optional(),
    validatedAt: Joi.string().allow('').optional(),
  }).unknown(true).required(),
  message: Joi.string().allow('', null).optional(),
}).unknown(true);

export class HttpExternalVerifier implements ExternalVerifier {
  private readonly url: string;

  constructor(private readonly config: HttpVerifierConfig) {
    this.url = `${config.baseUrl.replace(/\/+$/, '')}${VALIDATE_SESSION_PATH}`;
  }

  async verify(sessionToken: string, userId: string, correlationId: string): Promise<VerificationResult> {
    const startTime = Date.now();
    let response: Response;

    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Apikey': this.config.apiKey,
          'Content-Type': 'application/json',
          'x-request-id': correlationId,
          'x-session-token': sessionToken,
          'x-user-id': userId,
        },
        body: JSON.stringify({}),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw ErrorFactory.createVerificationUnavailableError(
        timedOut
          ? `Session verification timed out after ${this.config.timeoutMs}ms`
          : `Session verification request failed: ${error instanceof Error ? error.message : String(error)}`,
        { correlationId },
        error
      );
    }

    logger.logApiCall('POST', this.url, response.status, Date.now() - startTime, { correlationId });

    if (!response.ok) {
      throw ErrorFactory.createVerificationUnavailableError(
        `Session verification returned HTTP ${response.status}`,
        { correlationId, statusCode: response.status }
      );
    }

    const body = await this.readBody(response, correlationId);
    const { error, value } = validateSessionResponseSchema.validate(body);

    if (error) {
      throw ErrorFactory.createVerificationUnavailableError(
        `Malformed session verification response: ${error.message}`,
        { correlationId }
      );
    }

    if (value.status !== 'success') {
      throw ErrorFactory.createVerificationUnavailableError(
        `Session verification returned status ${value.status}`,
        { correlationId }
      );
    }

    return { valid: !value.data.isExpire };
  }

  private async readBody(response: Response, correlationId: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw ErrorFactory.createVerificationUnavailableError(
        'Session verification response is not JSON',
        { correlationId },
        error
      );
    }
  }
}

/**
 * Routes verification to the verifier registered for a session's business
 * unit. Only business units with a registered verifier can be renewed.
 */
export class VerifierRegistry {
  private readonly verifiers = new Map<string, ExternalVerifier>();

  register(businessUnit: string, verifier: ExternalVerifier): this {
    this.verifiers.set(businessUnit.toUpperCase(), verifier);
    return this;
  }

  forBusinessUnit(businessUnit: string): ExternalVerifier {
    const verifier = this.verifiers.get(businessUnit.toUpperCase());
    if (!verifier) {
      throw ErrorFactory.createConfigurationError(
        `No session verifier configured for business unit ${businessUnit}`,
        'Session verification is not configured for this business unit.',
        { businessUnit }
      );
    }
    return verifier;
  }

  has(businessUnit: string): boolean {
    return this.verifiers.has(businessUnit.toUpperCase());
  }
}
