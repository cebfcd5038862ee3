import { SignJWT, jwtVerify, errors, JWTPayload } from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { MintedToken, TokenClaims, TokenSubject, TokenType } from '../models/session.model';
import { ErrorFactory } from '../utils/error-handler';

export interface TokenServiceConfig {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  issuer?: string;
  now?: () => number;
}

const ALGORITHM = 'HS256';
const DEFAULT_ISSUER = 'postlogin-session';

/**
 * Mints and parses the signed access/refresh tokens handed to clients.
 * Holds no mutable state; the clock is injectable.
 */
export class TokenService {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly now: () => number;

  constructor(private readonly config: TokenServiceConfig) {
    if (config.refreshTtlSeconds <= config.accessTtlSeconds) {
      throw new Error('Refresh token lifetime must exceed access token lifetime');
    }
    this.key = new TextEncoder().encode(config.secret);
    this.issuer = config.issuer ?? DEFAULT_ISSUER;
    this.now = config.now ?? Date.now;
  }

  /**
   * @param tokenId - nonce to embed as `jti`; a fresh one is generated when omitted
   */
  async mint(subject: TokenSubject, tokenType: TokenType, tokenId: string = uuidv4()): Promise<MintedToken> {
    const issuedAt = Math.floor(this.now() / 1000);
    const lifetime = tokenType === 'access' ? this.config.accessTtlSeconds : this.config.refreshTtlSeconds;
    const expiresAt = issuedAt + lifetime;

    const token = await new SignJWT({
      handle: subject.handle,
      bu: subject.businessUnit,
      typ: tokenType,
    })
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(subject.sessionId)
      .setIssuer(this.issuer)
      .setJti(tokenId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return { token, tokenId, expiresAt: expiresAt * 1000 };
  }

  async parse(token: string, expectedType: TokenType): Promise<TokenClaims> {
    let payload: JWTPayload;

    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [ALGORITHM],
        issuer: this.issuer,
        currentDate: new Date(this.now()),
      }));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw ErrorFactory.createTokenExpiredError(`${expectedType} token expired`);
      }
      throw ErrorFactory.createInvalidTokenError(
        `Invalid ${expectedType} token`,
        { reason: error instanceof Error ? error.name : String(error) },
        error
      );
    }

    return this.toClaims(payload, expectedType);
  }

  private toClaims(payload: JWTPayload, expectedType: TokenType): TokenClaims {
    const { sub, jti, iat, exp, handle, bu, typ } = payload;

    if (typ !== expectedType) {
      throw ErrorFactory.createInvalidTokenError(`Expected ${expectedType} token but got ${String(typ)}`);
    }

    if (
      typeof sub !== 'string' || sub === '' ||
      typeof jti !== 'string' || jti === '' ||
      typeof handle !== 'string' || handle === '' ||
      typeof bu !== 'string' || bu === '' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number'
    ) {
      throw ErrorFactory.createInvalidTokenError(`Malformed ${expectedType} token claims`);
    }

    return {
      sessionId: sub,
      handle,
      businessUnit: bu,
      tokenType: expectedType,
      tokenId: jti,
      issuedAt: iat * 1000,
      expiresAt: exp * 1000,
    };
  }
}
