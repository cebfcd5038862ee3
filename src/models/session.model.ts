export interface BasicCustomerInfo {
  customerId?: string;
  customerName?: string;
  customerType?: string;
}

export interface PostloginPayload {
  channelId: string;
  [key: string]: unknown;
}

export interface InitiateSessionRequest {
  cif: string;
  basicCustomerInfo: BasicCustomerInfo;
  tokenKey: string;
  payload: PostloginPayload;
}

export interface RenewTokenRequest {
  refreshToken: string;
}

/**
 * Session state persisted under `session:<sessionId>`. Timestamps are epoch
 * milliseconds. Everything except `refreshTokenId`, `updatedAt` and
 * `expiresAt` is fixed at initiation.
 */
export interface SessionRecord {
  sessionId: string;
  handle: string;
  customerId: string;
  businessUnit: string;
  customerType?: string;
  basicCustomerInfo: BasicCustomerInfo;
  channelId: string;
  externalTokenKey: string;
  refreshTokenId: string;
  correlationId?: string;
  createdAt: number;
  updatedAt: number;
  expiresAt: number;
}

export type TokenType = 'access' | 'refresh';

export interface TokenSubject {
  sessionId: string;
  handle: string;
  businessUnit: string;
}

export interface TokenClaims extends TokenSubject {
  tokenType: TokenType;
  tokenId: string;
  issuedAt: number;
  expiresAt: number;
}

export interface MintedToken {
  token: string;
  tokenId: string;
  expiresAt: number;
}

export interface SessionTokenResponse {
  token: string;
  refreshToken: string;
  message: string;
}

export interface SessionView {
  sessionId: string;
  handle: string;
  businessUnit: string;
  customerId: string;
  customerType?: string;
  expiresAt: string;
}
