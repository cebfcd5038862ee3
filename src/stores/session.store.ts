import { SessionRecord } from '../models/session.model';

/**
 * TTL-bound key-value store of session records.
 *
 * `get` resolves `null` both for keys that never existed and for records
 * whose `expiresAt` has passed; callers cannot tell the two apart.
 */
export interface SessionStore {
  get(sessionId: string): Promise<SessionRecord | null>;
  /** Upsert; overwrites any existing record and resets its TTL. */
  put(sessionId: string, record: SessionRecord, ttlSeconds: number): Promise<void>;
  /** Idempotent. */
  delete(sessionId: string): Promise<void>;
  refreshTtl(sessionId: string, ttlSeconds: number): Promise<boolean>;
  /**
   * Overwrites only when the stored record still carries
   * `expectedRefreshTokenId`. Resolves `false` when it does not or when the
   * record is gone.
   */
  compareAndPut(
    sessionId: string,
    expectedRefreshTokenId: string,
    record: SessionRecord,
    ttlSeconds: number
  ): Promise<boolean>;
  ping(): Promise<boolean>;
}

export const SESSION_KEY_PREFIX = 'session:';

export function sessionKey(sessionId: string): string {
  return `${SESSION_KEY_PREFIX}${sessionId}`;
}
