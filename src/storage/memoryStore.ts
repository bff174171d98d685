import type { Portfolio } from '../domain/models.js';

import type { DurableStore, SaveResult, SnapshotRecord } from './durableStore.js';
import { encodeSnapshot } from './snapshotCodec.js';

/**
 * Process-local store. Used when no Supabase project is configured and as the
 * stand-in backend in tests.
 */
export class MemoryStore implements DurableStore {
  private readonly records = new Map<string, SnapshotRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  async load(userId: string): Promise<SnapshotRecord | null> {
    const record = this.records.get(userId);
    return record ? structuredClone(record) : null;
  }

  async loadAll(): Promise<SnapshotRecord[]> {
    return [...this.records.values()].map((record) => structuredClone(record));
  }

  async save(userId: string, portfolio: Portfolio, expectedVersion: number): Promise<SaveResult> {
    const remoteVersion = this.records.get(userId)?.version ?? 0;
    if (remoteVersion !== expectedVersion) {
      return { status: 'conflict', remoteVersion };
    }

    const encoded = encodeSnapshot(portfolio);
    this.records.set(userId, {
      userId,
      version: portfolio.version,
      payload: encoded.payload,
      checksum: encoded.checksum,
      updatedAt: this.now()
    });

    return { status: 'ok', version: portfolio.version };
  }

  /** Writes a record as-is, bypassing version checks. */
  putRaw(record: SnapshotRecord): void {
    this.records.set(record.userId, structuredClone(record));
  }

  size(): number {
    return this.records.size;
  }
}
