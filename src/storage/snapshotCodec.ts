import { CorruptedStateError } from '../domain/errors.js';
import type { Portfolio } from '../domain/models.js';
import { hashObject } from '../domain/models.js';

import type { SnapshotRecord } from './durableStore.js';

export type EncodedSnapshot = {
  payload: Portfolio;
  checksum: string;
};

/** sha256 over the canonical (key-sorted) JSON of the portfolio. */
export function encodeSnapshot(portfolio: Portfolio): EncodedSnapshot {
  const payload = structuredClone(portfolio);
  return { payload, checksum: hashObject(payload) };
}

/**
 * Returns the record's payload once its checksum matches and its row metadata
 * agrees with it. Schema validation is left to the ledger.
 */
export function decodeSnapshot(record: SnapshotRecord): unknown {
  if (hashObject(record.payload) !== record.checksum) {
    throw new CorruptedStateError(record.userId, 'snapshot checksum mismatch');
  }

  const payload = record.payload;
  if (typeof payload !== 'object' || payload === null) {
    throw new CorruptedStateError(record.userId, 'snapshot payload is not an object');
  }

  const storedUserId: unknown = Reflect.get(payload, 'userId');
  const storedVersion: unknown = Reflect.get(payload, 'version');

  if (storedUserId !== record.userId) {
    throw new CorruptedStateError(record.userId, `snapshot belongs to ${String(storedUserId)}`);
  }

  if (storedVersion !== record.version) {
    throw new CorruptedStateError(
      record.userId,
      `snapshot version ${String(storedVersion)} does not match row version ${record.version}`
    );
  }

  return payload;
}
