import { RedisSessionStore } from '../../../src/stores/redis-session.store';
import { sessionKey } from '../../../src/stores/session.store';
import { ErrorType } from '../../../src/utils/error-handler';
import { FakeRedis } from '../../mocks/redis.mock';
import { TestClock } from '../../helpers/test-setup';
import { buildSessionRecord, FIXED_NOW } from '../../fixtures/sessions';

describe('RedisSessionStore', () => {
  let clock: TestClock;
  let redis: FakeRedis;
  let store: RedisSessionStore;
  const record = buildSessionRecord();
  const sessionId = record.sessionId;
  const key = sessionKey(sessionId);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    clock = new TestClock();
    redis = new FakeRedis(clock.now);
    store = new RedisSessionStore(redis, clock.now);
  });

  it('should namespace keys under session:', () => {
    expect(key).toBe('session:b3c1f6a2-0000-4000-8000-000000000001');
  });

  describe('put', () => {
    it('should store the record as JSON with the requested ttl', async () => {
      await store.put(sessionId, record, 600);

      expect(redis.raw(key)).toBe(JSON.stringify(record));
      expect(redis.pttl(key)).toBe(600 * 1000);
    });

    it('should cap the ttl at the record expiry', async () => {
      await store.put(sessionId, buildSessionRecord({ expiresAt: FIXED_NOW + 30 * 1000 }), 3600);

      expect(redis.pttl(key)).toBe(30 * 1000);
    });

    it('should delete instead of writing an expired record', async () => {
      await store.put(sessionId, record, 3600);

      await store.put(sessionId, buildSessionRecord({ expiresAt: FIXED_NOW - 1 }), 3600);

      expect(redis.raw(key)).toBeUndefined();
      expect(redis.callCount('set')).toBe(1);
    });
  });

  describe('get', () => {
    it('should load a stored record', async () => {
      await store.put(sessionId, record, 3600);

      await expect(store.get(sessionId)).resolves.toEqual(record);
    });

    it('should return null for a missing key', async () => {
      await expect(store.get('missing')).resolves.toBeNull();
    });

    it('should ignore a record past its expiresAt that Redis has not reaped', async () => {
      redis.seed(key, JSON.stringify(buildSessionRecord({ expiresAt: FIXED_NOW - 1000 })));

      await expect(store.get(sessionId)).resolves.toBeNull();
    });

    it('should reject data that is not JSON', async () => {
      redis.seed(key, '{not json');

      await expect(store.get(sessionId)).rejects.toMatchObject({
        type: ErrorType.INTERNAL,
        message: 'Invalid session data',
      });
    });

    it('should reject a record with missing fields', async () => {
      redis.seed(key, JSON.stringify({ sessionId, handle: 'VPB-SME-1' }));

      await expect(store.get(sessionId)).rejects.toMatchObject({
        type: ErrorType.INTERNAL,
        message: 'Invalid session data',
      });
    });
  });

  it('should delete idempotently', async () => {
    await store.put(sessionId, record, 3600);

    await store.delete(sessionId);
    await store.delete(sessionId);

    expect(redis.raw(key)).toBeUndefined();
  });

  describe('refreshTtl', () => {
    it('should extend a live record and its key expiry', async () => {
      await store.put(sessionId, record, 3600);
      clock.advanceSeconds(1200);

      await expect(store.refreshTtl(sessionId, 3600)).resolves.toBe(true);

      expect(redis.pttl(key)).toBe(3600 * 1000);
      const loaded = await store.get(sessionId);
      expect(loaded?.expiresAt).toBe(FIXED_NOW + 4800 * 1000);
    });

    it('should report false for a missing record', async () => {
      await expect(store.refreshTtl(sessionId, 3600)).resolves.toBe(false);
    });

    it('should keep a refresh token id written between its read and its write', async () => {
      await store.put(sessionId, record, 3600);
      clock.advanceSeconds(60);
      const renewed = buildSessionRecord({ refreshTokenId: 'refresh-id-2', updatedAt: FIXED_NOW + 60 * 1000 });
      const readThenRenew = redis.get.bind(redis);
      jest.spyOn(redis, 'get').mockImplementationOnce(async (readKey: string) => {
        const value = await readThenRenew(readKey);
        await store.put(sessionId, renewed, 3600);
        return value;
      });

      await expect(store.refreshTtl(sessionId, 3600)).resolves.toBe(true);

      const loaded = await store.get(sessionId);
      expect(loaded?.refreshTokenId).toBe('refresh-id-2');
      expect(loaded?.expiresAt).toBe(FIXED_NOW + 3660 * 1000);
      expect(redis.callCount('eval')).toBe(2);
    });

    it('should give up when the record keeps changing', async () => {
      await store.put(sessionId, record, 3600);
      const readThenChange = redis.get.bind(redis);
      let version = 0;
      jest.spyOn(redis, 'get').mockImplementation(async (readKey: string) => {
        const value = await readThenChange(readKey);
        version += 1;
        await store.put(sessionId, buildSessionRecord({ refreshTokenId: `refresh-id-${version + 1}` }), 3600);
        return value;
      });

      await expect(store.refreshTtl(sessionId, 3600)).resolves.toBe(false);
      expect(redis.callCount('eval')).toBe(3);
    });
  });

  describe('compareAndPut', () => {
    const replacement = buildSessionRecord({ refreshTokenId: 'refresh-id-2' });

    it('should swap when the refresh token id matches', async () => {
      await store.put(sessionId, record, 3600);

      await expect(store.compareAndPut(sessionId, 'refresh-id-1', replacement, 3600)).resolves.toBe(true);
      expect(redis.raw(key)).toBe(JSON.stringify(replacement));
    });

    it('should refuse when the refresh token id differs', async () => {
      await store.put(sessionId, record, 3600);

      await expect(store.compareAndPut(sessionId, 'refresh-id-9', replacement, 3600)).resolves.toBe(false);
      expect(redis.raw(key)).toBe(JSON.stringify(record));
    });

    it('should let only one of two concurrent swaps through', async () => {
      await store.put(sessionId, record, 3600);
      const other = buildSessionRecord({ refreshTokenId: 'refresh-id-3' });

      const results = await Promise.all([
        store.compareAndPut(sessionId, 'refresh-id-1', replacement, 3600),
        store.compareAndPut(sessionId, 'refresh-id-1', other, 3600),
      ]);

      expect(results).toEqual([true, false]);
      expect(redis.raw(key)).toBe(JSON.stringify(replacement));
    });

    it('should refuse when the session is gone', async () => {
      await expect(store.compareAndPut(sessionId, 'refresh-id-1', replacement, 3600)).resolves.toBe(false);
      expect(redis.raw(key)).toBeUndefined();
    });

    it('should not run the script for a replacement that is already expired', async () => {
      await store.put(sessionId, record, 3600);

      const expired = buildSessionRecord({ refreshTokenId: 'refresh-id-2', expiresAt: FIXED_NOW });
      await expect(store.compareAndPut(sessionId, 'refresh-id-1', expired, 3600)).resolves.toBe(false);
      expect(redis.callCount('eval')).toBe(0);
    });
  });

  describe('ping', () => {
    it('should report a healthy connection', async () => {
      await expect(store.ping()).resolves.toBe(true);
    });

    it('should report false when the connection is closed', async () => {
      redis.disconnect();

      await expect(store.ping()).resolves.toBe(false);
    });
  });
});
