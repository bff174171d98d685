import type { SupabaseClient } from '@supabase/supabase-js';
import type { Logger } from 'pino';
import pino from 'pino';
import { z } from 'zod';

import type { Portfolio } from '../domain/models.js';

import type { DurableStore, SaveResult, SnapshotRecord } from './durableStore.js';
import { encodeSnapshot } from './snapshotCodec.js';
import {
  DEFAULT_SUPABASE_RETRY_COUNT,
  DEFAULT_SUPABASE_TIMEOUT_MS,
  SupabaseStoreError,
  runSupabaseRequest
} from './supabaseRequest.js';

export { SupabaseStoreError } from './supabaseRequest.js';

export type SupabaseStoreOptions = {
  client: SupabaseClient;
  table?: string;
  logger?: Logger;
  pageSize?: number;
  retryCount?: number;
  requestTimeoutMs?: number;
  now?: () => number;
};

const DEFAULT_TABLE = 'paper_portfolios';
const DEFAULT_PAGE_SIZE = 500;
const UNIQUE_VIOLATION = '23505';
const SNAPSHOT_COLUMNS = 'user_id, version, payload, checksum, updated_at';

const snapshotRowSchema = z.object({
  user_id: z.string().min(1),
  version: z.coerce.number().int().nonnegative(),
  payload: z.unknown(),
  checksum: z.string(),
  updated_at: z.string().nullable().optional()
});

const versionRowSchema = z.object({
  version: z.coerce.number().int().nonnegative()
});

type SnapshotRow = z.infer<typeof snapshotRowSchema>;

/**
 * Portfolio snapshots in the `paper_portfolios` table
 * (`user_id` primary key, `version`, `payload` jsonb, `checksum`, `updated_at`).
 * Writes are compare-and-set on `version`.
 */
export class SupabaseStore implements DurableStore {
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly logger: Logger;
  private readonly pageSize: number;
  private readonly retryCount: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: SupabaseStoreOptions) {
    this.client = options.client;
    this.table = options.table ?? DEFAULT_TABLE;
    this.logger = options.logger ?? pino({ name: 'supabase-store' });
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.retryCount = options.retryCount ?? DEFAULT_SUPABASE_RETRY_COUNT;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_SUPABASE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  async load(userId: string): Promise<SnapshotRecord | null> {
    return this.withRetry('load', async (signal) => {
      const { data, error } = await this.client
        .from(this.table)
        .select(SNAPSHOT_COLUMNS)
        .eq('user_id', userId)
        .abortSignal(signal)
        .maybeSingle();

      if (error) {
        throw new SupabaseStoreError('load', error);
      }

      return data ? toRecord(snapshotRowSchema.parse(data)) : null;
    });
  }

  async loadAll(): Promise<SnapshotRecord[]> {
    const records: SnapshotRecord[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const rows = await this.withRetry('loadAll', async (signal) => {
        const { data, error } = await this.client
          .from(this.table)
          .select(SNAPSHOT_COLUMNS)
          .order('user_id', { ascending: true })
          .range(from, from + this.pageSize - 1)
          .abortSignal(signal);

        if (error) {
          throw new SupabaseStoreError('loadAll', error);
        }

        return z.array(snapshotRowSchema).parse(data ?? []);
      });

      records.push(...rows.map(toRecord));
      if (rows.length < this.pageSize) {
        break;
      }
    }

    this.logger.info({ count: records.length }, 'portfolio snapshots loaded');
    return records;
  }

  async save(userId: string, portfolio: Portfolio, expectedVersion: number): Promise<SaveResult> {
    const encoded = encodeSnapshot(portfolio);
    const row = {
      user_id: userId,
      version: portfolio.version,
      payload: encoded.payload,
      checksum: encoded.checksum,
      updated_at: new Date(this.now()).toISOString()
    };

    if (expectedVersion === 0) {
      return this.withRetry('insert', async (signal): Promise<SaveResult> => {
        const { error } = await this.client.from(this.table).insert(row).abortSignal(signal);

        if (error?.code === UNIQUE_VIOLATION) {
          return { status: 'conflict', remoteVersion: await this.remoteVersion(userId, signal) };
        }
        if (error) {
          throw new SupabaseStoreError('insert', error);
        }

        return { status: 'ok', version: portfolio.version };
      });
    }

    return this.withRetry('update', async (signal): Promise<SaveResult> => {
      const { data, error } = await this.client
        .from(this.table)
        .update(row)
        .eq('user_id', userId)
        .eq('version', expectedVersion)
        .select('version')
        .abortSignal(signal);

      if (error) {
        throw new SupabaseStoreError('update', error);
      }

      if (z.array(versionRowSchema).parse(data ?? []).length === 0) {
        return { status: 'conflict', remoteVersion: await this.remoteVersion(userId, signal) };
      }

      return { status: 'ok', version: portfolio.version };
    });
  }

  private async remoteVersion(userId: string, signal: AbortSignal): Promise<number> {
    const { data, error } = await this.client
      .from(this.table)
      .select('version')
      .eq('user_id', userId)
      .abortSignal(signal)
      .maybeSingle();

    if (error) {
      throw new SupabaseStoreError('version lookup', error);
    }

    return data ? versionRowSchema.parse(data).version : 0;
  }

  private async withRetry<T>(action: string, request: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return runSupabaseRequest(action, request, {
      logger: this.logger,
      retryCount: this.retryCount,
      requestTimeoutMs: this.requestTimeoutMs
    });
  }
}

function toRecord(row: SnapshotRow): SnapshotRecord {
  const updatedAt = row.updated_at ? Date.parse(row.updated_at) : 0;

  return {
    userId: row.user_id,
    version: row.version,
    payload: row.payload,
    checksum: row.checksum,
    updatedAt: Number.isFinite(updatedAt) ? updatedAt : 0
  };
}
