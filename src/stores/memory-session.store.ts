import { SessionRecord } from '../models/session.model';
import { SessionStore } from './session.store';

interface StoredEntry {
  value: string;
  expiresAt: number;
}

/**
 * In-process session store for local development and tests. Entries are
 * serialised so callers never share object references with the store.
 */
export class MemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, StoredEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    return this.read(sessionId);
  }

  async put(sessionId: string, record: SessionRecord, ttlSeconds: number): Promise<void> {
    this.write(sessionId, record, ttlSeconds);
  }

  async delete(sessionId: string): Promise<void> {
    this.entries.delete(sessionId);
  }

  // No await between read and write in the two methods below

  async refreshTtl(sessionId: string, ttlSeconds: number): Promise<boolean> {
    const record = this.read(sessionId);
    if (!record) {
      return false;
    }
    this.write(sessionId, { ...record, expiresAt: this.now() + ttlSeconds * 1000 }, ttlSeconds);
    return true;
  }

  async compareAndPut(
    sessionId: string,
    expectedRefreshTokenId: string,
    record: SessionRecord,
    ttlSeconds: number
  ): Promise<boolean> {
    const current = this.read(sessionId);
    if (!current || current.refreshTokenId !== expectedRefreshTokenId) {
      return false;
    }
    this.write(sessionId, record, ttlSeconds);
    return true;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Raw stored value, including entries that are logically expired. */
  peek(sessionId: string): string | undefined {
    return this.entries.get(sessionId)?.value;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private read(sessionId: string): SessionRecord | null {
    const entry = this.liveEntry(sessionId);
    if (!entry) {
      return null;
    }
    const record: SessionRecord = JSON.parse(entry.value);
    return record.expiresAt <= this.now() ? null : record;
  }

  private write(sessionId: string, record: SessionRecord, ttlSeconds: number): void {
    const expiresAt = Math.min(this.now() + ttlSeconds * 1000, record.expiresAt);
    if (expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return;
    }
    this.entries.set(sessionId, {
      value: JSON.stringify(record),
      expiresAt,
    });
  }

  private liveEntry(sessionId: string): StoredEntry | undefined {
    const entry = this.entries.get(sessionId);
    if (entry && entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return undefined;
    }
    return entry;
  }
}
