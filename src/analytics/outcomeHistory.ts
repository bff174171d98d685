import type { SupabaseClient } from '@supabase/supabase-js';
import type { Logger } from 'pino';
import pino from 'pino';
import { z } from 'zod';

import type { SignalClass } from '../domain/models.js';
import type { PortfolioLedger } from '../portfolio/portfolioLedger.js';
import {
  DEFAULT_SUPABASE_RETRY_COUNT,
  DEFAULT_SUPABASE_TIMEOUT_MS,
  SupabaseStoreError,
  runSupabaseRequest
} from '../storage/supabaseRequest.js';

/** Peak ROI of past closed positions, in percent, for one signal class. */
export interface OutcomeHistorySource {
  fetchPeakRois(signalClass: SignalClass): Promise<number[]>;
}

export type SupabaseOutcomeSourceOptions = {
  client: SupabaseClient;
  table?: string;
  /** Most recent outcomes to read per class. */
  sampleLimit?: number;
  logger?: Logger;
  retryCount?: number;
  requestTimeoutMs?: number;
};

const outcomeRowSchema = z.object({
  ath_roi: z.coerce.number().finite()
});

/** Reads `signal_outcomes` rows (`signal_class`, `ath_roi` percent, `closed_at`). */
export class SupabaseOutcomeSource implements OutcomeHistorySource {
  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly sampleLimit: number;
  private readonly logger: Logger;
  private readonly retryCount: number;
  private readonly requestTimeoutMs: number;

  constructor(options: SupabaseOutcomeSourceOptions) {
    this.client = options.client;
    this.table = options.table ?? 'signal_outcomes';
    this.sampleLimit = options.sampleLimit ?? 1000;
    this.logger = options.logger ?? pino({ name: 'outcome-source' });
    this.retryCount = options.retryCount ?? DEFAULT_SUPABASE_RETRY_COUNT;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_SUPABASE_TIMEOUT_MS;
  }

  async fetchPeakRois(signalClass: SignalClass): Promise<number[]> {
    return runSupabaseRequest(
      `${signalClass} outcomes`,
      async (signal) => {
        const { data, error } = await this.client
          .from(this.table)
          .select('ath_roi')
          .eq('signal_class', signalClass)
          .not('ath_roi', 'is', null)
          .order('closed_at', { ascending: false })
          .limit(this.sampleLimit)
          .abortSignal(signal);

        if (error) {
          throw new SupabaseStoreError(`${signalClass} outcomes`, error);
        }

        return z
          .array(outcomeRowSchema)
          .parse(data ?? [])
          .map((row) => row.ath_roi);
      },
      { logger: this.logger, retryCount: this.retryCount, requestTimeoutMs: this.requestTimeoutMs }
    );
  }
}

/** Uses the engine's own closed positions when no outcome table is configured. */
export class LedgerOutcomeSource implements OutcomeHistorySource {
  constructor(private readonly ledger: PortfolioLedger) {}

  async fetchPeakRois(signalClass: SignalClass): Promise<number[]> {
    const samples: number[] = [];

    for (const userId of this.ledger.listUserIds()) {
      const history = this.ledger.snapshot(userId)?.history ?? [];
      for (const record of history) {
        if (record.signalClass === signalClass) {
          samples.push(record.peakRoi * 100);
        }
      }
    }

    return samples;
  }
}

export type OutcomeStatsServiceOptions = {
  source: OutcomeHistorySource;
  refreshIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
};

type CacheEntry = {
  samples: number[];
  loadedAt: number;
};

const DEFAULT_REFRESH_INTERVAL_MS = 10 * 60_000;

/**
 * Caches sample sets per signal class. A failed refresh keeps serving the
 * previous samples; with nothing cached the exit rules fall back to the
 * default take-profit.
 */
export class OutcomeStatsService {
  private readonly source: OutcomeHistorySource;
  private readonly refreshIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly cache = new Map<SignalClass, CacheEntry>();
  private readonly pending = new Map<SignalClass, Promise<number[]>>();

  constructor(options: OutcomeStatsServiceOptions) {
    this.source = options.source;
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.logger = options.logger ?? pino({ name: 'outcome-stats' });
    this.now = options.now ?? Date.now;
  }

  async getPeakRois(signalClass: SignalClass): Promise<number[]> {
    const cached = this.cache.get(signalClass);
    if (cached && this.now() - cached.loadedAt < this.refreshIntervalMs) {
      return cached.samples;
    }

    const inFlight = this.pending.get(signalClass);
    if (inFlight) {
      return inFlight;
    }

    const load = this.refresh(signalClass, cached).finally(() => this.pending.delete(signalClass));
    this.pending.set(signalClass, load);
    return load;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async refresh(signalClass: SignalClass, previous: CacheEntry | undefined): Promise<number[]> {
    try {
      const samples = await this.source.fetchPeakRois(signalClass);
      this.cache.set(signalClass, { samples, loadedAt: this.now() });
      this.logger.debug({ signalClass, count: samples.length }, 'outcome samples refreshed');
      return samples;
    } catch (error: unknown) {
      this.logger.warn(
        { signalClass, errorMessage: error instanceof Error ? error.message : String(error) },
        'outcome sample refresh failed'
      );
      return previous?.samples ?? [];
    }
  }
}
