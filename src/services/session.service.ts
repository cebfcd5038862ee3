import { v4 as uuidv4 } from 'uuid';
import {
  InitiateSessionRequest,
  SessionRecord,
  SessionTokenResponse,
  SessionView,
  TokenSubject,
} from '../models/session.model';
import { initiateSessionSchema, renewTokenSchema, validateOrThrow } from '../models/session.schema';
import { RenewalMode } from '../config';
import { ChannelRegistry } from '../config/channels';
import { SessionStore } from '../stores/session.store';
import { TokenService } from './token.service';
import { IdentityService } from './identity.service';
import { VerifierRegistry } from './verifier.service';
import { ErrorFactory, toAppError } from '../utils/error-handler';
import { logger, LogMetadata } from '../utils/logger';

export interface SessionServiceOptions {
  store: SessionStore;
  tokens: TokenService;
  identity: IdentityService;
  channels: ChannelRegistry;
  verifiers: VerifierRegistry;
  sessionTtlSeconds: number;
  renewalMode?: RenewalMode;
  now?: () => number;
}

/**
 * Session lifecycle: Absent -> Active -> (Renewed)* -> Expired/Invalidated.
 *
 * Stateless; every piece of mutable state lives in the injected store.
 * VERIFICATION_UNAVAILABLE is the only retryable failure and leaves the
 * stored record untouched.
 */
export class SessionService {
  private readonly store: SessionStore;
  private readonly tokens: TokenService;
  private readonly identity: IdentityService;
  private readonly channels: ChannelRegistry;
  private readonly verifiers: VerifierRegistry;
  private readonly ttlSeconds: number;
  private readonly renewalMode: RenewalMode;
  private readonly now: () => number;

  constructor(options: SessionServiceOptions) {
    this.store = options.store;
    this.tokens = options.tokens;
    this.identity = options.identity;
    this.channels = options.channels;
    this.verifiers = options.verifiers;
    this.ttlSeconds = options.sessionTtlSeconds;
    this.renewalMode = options.renewalMode ?? 'last-writer-wins';
    this.now = options.now ?? Date.now;
  }

  getRenewalMode(): RenewalMode {
    return this.renewalMode;
  }

  /**
   * Opens a session for a customer already authenticated upstream. The
   * external token key is stored for later re-verification, not checked here.
   */
  async initiate(input: unknown, correlationId: string = uuidv4()): Promise<SessionTokenResponse> {
    const request = validateOrThrow(initiateSessionSchema, input, 'session initiation request');
    const metadata: LogMetadata = { correlationId, channelId: request.payload.channelId };

    const businessUnit = this.channels.resolveBusinessUnit(request.payload.channelId);
    const handle = this.identity.buildHandle(businessUnit, request.cif);

    try {
      const sessionId = uuidv4();
      const subject: TokenSubject = { sessionId, handle, businessUnit };
      const access = await this.tokens.mint(subject, 'access');
      const refresh = await this.tokens.mint(subject, 'refresh');

      const createdAt = this.now();
      const record = this.buildRecord(request, {
        sessionId,
        handle,
        businessUnit,
        refreshTokenId: refresh.tokenId,
        correlationId,
        createdAt,
      });

      await this.store.put(sessionId, record, this.ttlSeconds);

      logger.info('Post-login session initialized', { ...metadata, sessionId, handle, businessUnit });

      return {
        token: access.token,
        refreshToken: refresh.token,
        message: `${businessUnit} session initialized successfully`,
      };
    } catch (error) {
      throw toAppError(error, 'Error in session initiation', metadata);
    }
  }

  async renew(refreshToken: unknown, correlationId?: string): Promise<SessionTokenResponse> {
    const { refreshToken: token } = validateOrThrow(renewTokenSchema, { refreshToken }, 'renewal request');
    const claims = await this.tokens.parse(token, 'refresh');
    const metadata: LogMetadata = { correlationId, sessionId: claims.sessionId, handle: claims.handle };

    const record = await this.loadSession(claims.sessionId, metadata);

    if (record.refreshTokenId !== claims.tokenId) {
      throw ErrorFactory.createStaleTokenError('Refresh token does not match the current session', metadata);
    }

    const verifierCorrelationId = correlationId || record.correlationId || uuidv4();
    const stopTimer = logger.startTimer(verifierCorrelationId, 'renew_token');

    try {
      return await this.verifyAndRotate(record, verifierCorrelationId, metadata);
    } finally {
      stopTimer();
    }
  }

  /**
   * Ends a session explicitly. Deleting an already absent session succeeds.
   */
  async invalidate(refreshToken: unknown, correlationId?: string): Promise<void> {
    const { refreshToken: token } = validateOrThrow(renewTokenSchema, { refreshToken }, 'logout request');
    const claims = await this.tokens.parse(token, 'refresh');
    const metadata: LogMetadata = { correlationId, sessionId: claims.sessionId };

    await this.guard(() => this.store.delete(claims.sessionId), 'Error in session invalidation', metadata);
    logger.info('Post-login session invalidated', metadata);
  }

  async describe(accessToken: string, correlationId?: string): Promise<SessionView> {
    const claims = await this.tokens.parse(accessToken, 'access');
    const metadata: LogMetadata = { correlationId, sessionId: claims.sessionId };
    const record = await this.loadSession(claims.sessionId, metadata);

    return {
      sessionId: record.sessionId,
      handle: record.handle,
      businessUnit: record.businessUnit,
      customerId: record.customerId,
      customerType: record.customerType,
      expiresAt: new Date(record.expiresAt).toISOString(),
    };
  }

  private async verifyAndRotate(
    record: SessionRecord,
    verifierCorrelationId: string,
    metadata: LogMetadata
  ): Promise<SessionTokenResponse> {
    const verifier = this.verifiers.forBusinessUnit(record.businessUnit);
    const verdict = await this.guard(
      () => verifier.verify(record.externalTokenKey, record.customerId, verifierCorrelationId),
      'Error in session verification',
      metadata
    );

    if (!verdict.valid) {
      await this.guard(() => this.store.delete(record.sessionId), 'Error deleting expired session', metadata);
      logger.info('Session invalidated by external authority', { ...metadata, businessUnit: record.businessUnit });
      throw ErrorFactory.createExternalSessionExpiredError(
        `Verify ${record.businessUnit} token failed`,
        metadata
      );
    }

    return this.guard(async () => {
      const subject: TokenSubject = {
        sessionId: record.sessionId,
        handle: record.handle,
        businessUnit: record.businessUnit,
      };
      const access = await this.tokens.mint(subject, 'access');
      const refresh = await this.tokens.mint(subject, 'refresh');

      const updatedAt = this.now();
      const renewed: SessionRecord = {
        ...record,
        refreshTokenId: refresh.tokenId,
        updatedAt,
        expiresAt: updatedAt + this.ttlSeconds * 1000,
      };

      if (this.renewalMode === 'compare-and-swap') {
        const swapped = await this.store.compareAndPut(record.sessionId, record.refreshTokenId, renewed, this.ttlSeconds);
        if (!swapped) {
          throw ErrorFactory.createStaleTokenError('Refresh token was consumed by a concurrent renewal', metadata);
        }
      } else {
        await this.store.put(record.sessionId, renewed, this.ttlSeconds);
      }

      logger.info('Post-login token renewed', { ...metadata, businessUnit: record.businessUnit });

      return {
        token: access.token,
        refreshToken: refresh.token,
        message: `${record.businessUnit} token renewed successfully`,
      };
    }, 'Error in token renewal', metadata);
  }

  private async loadSession(sessionId: string, metadata: LogMetadata): Promise<SessionRecord> {
    const record = await this.guard(() => this.store.get(sessionId), 'Error loading session', metadata);
    if (!record) {
      throw ErrorFactory.createSessionNotFoundError('Session not found', metadata);
    }
    return record;
  }

  private async guard<T>(operation: () => Promise<T>, context: string, metadata: LogMetadata): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toAppError(error, context, metadata);
    }
  }

  private buildRecord(
    request: InitiateSessionRequest,
    fields: Pick<SessionRecord, 'sessionId' | 'handle' | 'businessUnit' | 'refreshTokenId' | 'correlationId' | 'createdAt'>
  ): SessionRecord {
    return {
      sessionId: fields.sessionId,
      handle: fields.handle,
      customerId: request.cif,
      businessUnit: fields.businessUnit,
      customerType: request.basicCustomerInfo.customerType,
      basicCustomerInfo: {
        customerId: request.basicCustomerInfo.customerId,
        customerName: request.basicCustomerInfo.customerName,
        customerType: request.basicCustomerInfo.customerType,
      },
      channelId: request.payload.channelId,
      externalTokenKey: request.tokenKey,
      refreshTokenId: fields.refreshTokenId,
      correlationId: fields.correlationId,
      createdAt: fields.createdAt,
      updatedAt: fields.createdAt,
      expiresAt: fields.createdAt + this.ttlSeconds * 1000,
    };
  }
}
