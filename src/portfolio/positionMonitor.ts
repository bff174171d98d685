import type { Logger } from 'pino';
import pino from 'pino';

import { CorruptedStateError, PositionNotFoundError, PriceUnavailableError } from '../domain/errors.js';
import type { ClosedPosition, CloseReason, OpenPosition, PositionKey, SignalClass } from '../domain/models.js';
import { computeRoi, positionKeyId } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import { evaluateExit, type ExitRuleOptions } from '../exits/exitRules.js';
import type { PriceOracle } from '../pricing/priceOracle.js';
import { RecurringTask } from '../scheduler/recurringTask.js';

import type { LedgerPositionRef, PortfolioLedger } from './portfolioLedger.js';

export type PeakRoiProvider = {
  getPeakRois(signalClass: SignalClass): Promise<number[]>;
};

export type PositionMonitorConfig = ExitRuleOptions & {
  intervalMs: number;
  maxQuoteAgeSeconds: number;
};

export type PositionMonitorOptions = {
  ledger: PortfolioLedger;
  priceOracle: PriceOracle;
  outcomeStats: PeakRoiProvider;
  eventBus: EventBus;
  config?: Partial<PositionMonitorConfig>;
  logger?: Logger;
  now?: () => number;
};

export type MonitorCycleReport = {
  startedAt: number;
  durationMs: number;
  /** Positions that had a usable quote and went through the exit rules. */
  evaluated: number;
  closed: number;
  /** Positions left alone this cycle for lack of a usable quote. */
  skipped: number;
  failed: number;
};

const DEFAULT_CONFIG: PositionMonitorConfig = {
  intervalMs: 30_000,
  maxQuoteAgeSeconds: 300,
  defaultTakeProfitPercent: 50,
  smartQuantileReach: 0.75
};

type PositionOutcome = 'evaluated' | 'closed' | 'skipped' | 'failed';

/**
 * Periodically marks every open position to market and closes the ones whose
 * exit rule fires. Cycles never overlap and a bad quote or failing position
 * only affects itself.
 */
export class PositionMonitor {
  private readonly ledger: PortfolioLedger;
  private readonly priceOracle: PriceOracle;
  private readonly outcomeStats: PeakRoiProvider;
  private readonly eventBus: EventBus;
  private readonly config: PositionMonitorConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly task: RecurringTask;
  /** Highest ROI (fraction) seen per open position id. */
  private readonly peaks = new Map<string, number>();
  private lastReport: MonitorCycleReport | null = null;

  constructor(options: PositionMonitorOptions) {
    this.ledger = options.ledger;
    this.priceOracle = options.priceOracle;
    this.outcomeStats = options.outcomeStats;
    this.eventBus = options.eventBus;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger ?? pino({ name: 'position-monitor' });
    this.now = options.now ?? Date.now;
    this.task = new RecurringTask({
      name: 'position-monitor',
      intervalMs: this.config.intervalMs,
      logger: this.logger,
      run: async () => {
        await this.runCycle();
      }
    });
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  getLastReport(): MonitorCycleReport | null {
    return this.lastReport;
  }

  /** Peak ROI (fraction) observed so far for an open position, if tracked. */
  getPeakRoi(positionId: string): number | null {
    return this.peaks.get(positionId) ?? null;
  }

  async runCycle(): Promise<MonitorCycleReport> {
    const startedAt = this.now();
    const refs = this.ledger.listOpenPositions();

    const prices = await this.fetchPrices(refs, startedAt);
    const samples = await this.fetchSamples(refs);

    const outcomes = await Promise.all(
      refs.map((ref) => this.processPosition(ref, prices, samples, startedAt))
    );

    this.prunePeaks(refs);

    const report: MonitorCycleReport = {
      startedAt,
      durationMs: Math.max(0, this.now() - startedAt),
      evaluated: outcomes.filter((outcome) => outcome === 'evaluated' || outcome === 'closed').length,
      closed: outcomes.filter((outcome) => outcome === 'closed').length,
      skipped: outcomes.filter((outcome) => outcome === 'skipped').length,
      failed: outcomes.filter((outcome) => outcome === 'failed').length
    };

    this.lastReport = report;
    this.logger.debug(report, 'monitor cycle finished');
    return report;
  }

  /** Closes an open position at the current quote, outside the exit rules. */
  async closeNow(userId: string, key: PositionKey, reason: CloseReason = 'manual'): Promise<ClosedPosition> {
    const position = this.ledger.findOpenPosition(userId, key);
    if (!position) {
      throw new PositionNotFoundError(positionKeyId(key));
    }

    const quote = await this.priceOracle.getPrice(key.assetId);
    if (!quote || quote.price <= 0) {
      throw new PriceUnavailableError(key.assetId, 'no quote');
    }

    return this.close(userId, position, quote.price, reason, this.now());
  }

  private async fetchPrices(refs: LedgerPositionRef[], now: number): Promise<Map<string, number>> {
    const assetIds = [...new Set(refs.map((ref) => ref.position.key.assetId))];
    const maxAgeMs = this.config.maxQuoteAgeSeconds * 1000;
    const prices = new Map<string, number>();

    const settled = await Promise.allSettled(assetIds.map((assetId) => this.priceOracle.getPrice(assetId)));

    settled.forEach((outcome, index) => {
      const assetId = assetIds[index];
      if (assetId === undefined) {
        return;
      }

      let reason: string | null = null;
      if (outcome.status === 'rejected') {
        reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      } else if (!outcome.value || !(outcome.value.price > 0)) {
        reason = 'no quote';
      } else if (now - outcome.value.asOf > maxAgeMs) {
        reason = `quote is ${Math.round((now - outcome.value.asOf) / 1000)}s old`;
      } else {
        prices.set(assetId, outcome.value.price);
      }

      if (reason !== null) {
        const error = new PriceUnavailableError(assetId, reason);
        this.logger.warn({ assetId, reason }, error.message);
        this.eventBus.emit('price.unavailable', { assetId, reason });
      }
    });

    return prices;
  }

  private async fetchSamples(refs: LedgerPositionRef[]): Promise<Map<SignalClass, number[]>> {
    const classes = [...new Set(refs.map((ref) => ref.position.signalClass))];
    const samples = new Map<SignalClass, number[]>();

    await Promise.all(
      classes.map(async (signalClass) => {
        try {
          samples.set(signalClass, await this.outcomeStats.getPeakRois(signalClass));
        } catch (error: unknown) {
          this.logger.warn({ signalClass, err: error }, 'outcome samples unavailable, using default take-profit');
          samples.set(signalClass, []);
        }
      })
    );

    return samples;
  }

  private async processPosition(
    ref: LedgerPositionRef,
    prices: Map<string, number>,
    samples: Map<SignalClass, number[]>,
    now: number
  ): Promise<PositionOutcome> {
    const { userId, position } = ref;
    const price = prices.get(position.key.assetId);
    if (price === undefined) {
      return 'skipped';
    }

    try {
      this.trackPeak(position, price);

      const decision = evaluateExit(position, price, now, samples.get(position.signalClass) ?? [], this.config);
      if (decision.signal === 'none') {
        return 'evaluated';
      }

      this.logger.info(
        {
          userId,
          positionKey: positionKeyId(position.key),
          signal: decision.signal,
          roi: decision.roi,
          targetPercent: decision.targetPercent,
          targetSource: decision.targetSource
        },
        'exit rule fired'
      );

      await this.close(userId, position, price, decision.signal, now);
      return 'closed';
    } catch (error: unknown) {
      if (error instanceof PositionNotFoundError) {
        this.logger.debug({ userId, positionKey: error.positionKey }, 'position already closed');
        return 'skipped';
      }

      const level = error instanceof CorruptedStateError ? 'error' : 'warn';
      this.logger[level]({ userId, positionKey: positionKeyId(position.key), err: error }, 'position check failed');
      return 'failed';
    }
  }

  private async close(
    userId: string,
    position: OpenPosition,
    exitPrice: number,
    reason: CloseReason,
    now: number
  ): Promise<ClosedPosition> {
    const realizedRoi = Math.max(-1, computeRoi(position.entryPrice, exitPrice));
    const peakRoi = Math.max(this.peaks.get(position.id) ?? realizedRoi, realizedRoi);

    const closed = await this.ledger.closePosition(userId, position.key, {
      exitPrice,
      realizedRoi,
      reason,
      closedAt: now,
      peakRoi
    });
    this.peaks.delete(position.id);

    this.eventBus.emit('position.closed', {
      userId,
      position: closed,
      realizedRoi,
      capital: this.ledger.snapshot(userId)?.capital ?? 0
    });

    return closed;
  }

  private trackPeak(position: OpenPosition, price: number): void {
    const roi = computeRoi(position.entryPrice, price);
    const previous = this.peaks.get(position.id);
    if (previous === undefined || roi > previous) {
      this.peaks.set(position.id, roi);
    }
  }

  private prunePeaks(refs: LedgerPositionRef[]): void {
    const open = new Set(refs.map((ref) => ref.position.id));
    for (const id of this.peaks.keys()) {
      if (!open.has(id)) {
        this.peaks.delete(id);
      }
    }
  }
}
