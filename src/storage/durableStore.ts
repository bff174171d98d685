import type { Portfolio } from '../domain/models.js';

/**
 * A stored portfolio as it comes back from the backend. `payload` is not
 * trusted until its checksum is verified and it passes validation.
 */
export type SnapshotRecord = {
  userId: string;
  version: number;
  payload: unknown;
  checksum: string;
  updatedAt: number;
};

export type SaveResult = { status: 'ok'; version: number } | { status: 'conflict'; remoteVersion: number };

/**
 * Versioned portfolio storage. `save` succeeds only when the stored version
 * equals `expectedVersion` (0 meaning nothing is stored yet).
 */
export interface DurableStore {
  load(userId: string): Promise<SnapshotRecord | null>;
  loadAll(): Promise<SnapshotRecord[]>;
  save(userId: string, portfolio: Portfolio, expectedVersion: number): Promise<SaveResult>;
}
