import { SessionRecord } from '../models/session.model';
import { sessionRecordSchema } from '../models/session.schema';
import { SessionStore, sessionKey } from './session.store';
import { ErrorFactory } from '../utils/error-handler';
import { logger } from '../utils/logger';

/**
 * The subset of ioredis commands the store issues. An ioredis `Redis`
 * instance satisfies it.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  ping(): Promise<string>;
}

// KEYS[1] session key; ARGV: expected refreshTokenId, new value, ttl ms, now ms
export const COMPARE_AND_PUT_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 0 end
local record = cjson.decode(current)
if record.refreshTokenId ~= ARGV[1] then return 0 end
if tonumber(record.expiresAt) <= tonumber(ARGV[4]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
return 1
`;

// KEYS[1] session key; ARGV: value as last read, new value, ttl ms
export const REPLACE_IF_UNCHANGED_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
return 1
`;

const REFRESH_TTL_ATTEMPTS = 3;

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly now: () => number = Date.now
  ) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    const data = await this.redis.get(sessionKey(sessionId));
    if (!data) {
      return null;
    }

    const record = this.deserialize(sessionId, data);
    // Redis may not have reaped the key yet; expiresAt is authoritative
    if (record.expiresAt <= this.now()) {
      return null;
    }
    return record;
  }

  async put(sessionId: string, record: SessionRecord, ttlSeconds: number): Promise<void> {
    const ttlMs = this.effectiveTtl(record, ttlSeconds);
    if (ttlMs <= 0) {
      await this.delete(sessionId);
      return;
    }
    await this.redis.set(sessionKey(sessionId), JSON.stringify(record), 'PX', ttlMs);
  }

  async delete(sessionId: string): Promise<void> {
    const removed = await this.redis.del(sessionKey(sessionId));
    if (removed > 0) {
      logger.debug('Session removed from store', { sessionId });
    }
  }

  /**
   * Extends `expiresAt` and the key TTL. The write only lands if the stored
   * value is still the one that was read; a concurrent renewal forces a re-read
   * so its `refreshTokenId` is never overwritten.
   */
  async refreshTtl(sessionId: string, ttlSeconds: number): Promise<boolean> {
    const key = sessionKey(sessionId);

    for (let attempt = 1; attempt <= REFRESH_TTL_ATTEMPTS; attempt++) {
      const data = await this.redis.get(key);
      if (!data) {
        return false;
      }

      const record = this.deserialize(sessionId, data);
      if (record.expiresAt <= this.now()) {
        return false;
      }

      const refreshed: SessionRecord = { ...record, expiresAt: this.now() + ttlSeconds * 1000 };
      const result = await this.redis.eval(
        REPLACE_IF_UNCHANGED_SCRIPT,
        1,
        key,
        data,
        JSON.stringify(refreshed),
        ttlSeconds * 1000
      );
      if (result === 1) {
        return true;
      }
    }

    logger.warn('Session TTL refresh lost to concurrent writes', { sessionId, attempts: REFRESH_TTL_ATTEMPTS });
    return false;
  }

  async compareAndPut(
    sessionId: string,
    expectedRefreshTokenId: string,
    record: SessionRecord,
    ttlSeconds: number
  ): Promise<boolean> {
    const ttlMs = this.effectiveTtl(record, ttlSeconds);
    if (ttlMs <= 0) {
      return false;
    }

    const result = await this.redis.eval(
      COMPARE_AND_PUT_SCRIPT,
      1,
      sessionKey(sessionId),
      expectedRefreshTokenId,
      JSON.stringify(record),
      ttlMs,
      this.now()
    );
    return result === 1;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      logger.warn('Session store ping failed', { error });
      return false;
    }
  }

  // A record never outlives its own expiresAt, whatever TTL the caller asks for
  private effectiveTtl(record: SessionRecord, ttlSeconds: number): number {
    return Math.min(ttlSeconds * 1000, record.expiresAt - this.now());
  }

  private deserialize(sessionId: string, data: string): SessionRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw ErrorFactory.createInternalError('Invalid session data', { sessionId }, error);
    }

    const { error, value } = sessionRecordSchema.validate(parsed);
    if (error) {
      throw ErrorFactory.createInternalError('Invalid session data', { sessionId, reason: error.message });
    }
    return value;
  }
}
