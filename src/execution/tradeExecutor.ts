import type { Logger } from 'pino';
import pino from 'pino';

import {
  CorruptedStateError,
  DuplicatePositionError,
  InsufficientFundsError,
  PositionNotFoundError,
  ValidationError
} from '../domain/errors.js';
import type { ClosedPosition, ExitConfig, OpenPosition, Signal, SignalClass, UserPrefs } from '../domain/models.js';
import { computeRoi, positionKeyId, signalSchema, userPrefsSchema } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { PortfolioLedger } from '../portfolio/portfolioLedger.js';
import type { PriceOracle } from '../pricing/priceOracle.js';

export type RejectReason =
  | 'invalid_signal'
  | 'stale_signal'
  | 'trading_disabled'
  | 'grade_filtered'
  | 'portfolio_halted'
  | 'duplicate'
  | 'cooldown'
  | 'below_minimum'
  | 'insufficient_funds'
  | 'reserve_floor'
  | 'price_unavailable';

export type ExecutionResult =
  | { status: 'OPENED'; position: OpenPosition; swapped: ClosedPosition | null }
  | { status: 'REJECTED'; reason: RejectReason; message: string };

export type UserExecution =
  | { userId: string; status: 'done'; result: ExecutionResult }
  | { userId: string; status: 'failed'; error: string };

export type TradeExecutorConfig = {
  hardCapUsd: number;
  minTradeUsd: number;
  signalMaxAgeSeconds: number;
  reentryCooldownSeconds: number;
  /** Seconds a position may stay open, per signal class. */
  expiryBySignalClass: Record<SignalClass, number>;
};

export type TradeExecutorOptions = {
  ledger: PortfolioLedger;
  priceOracle: PriceOracle;
  eventBus: EventBus;
  config?: Partial<TradeExecutorConfig>;
  logger?: Logger;
  now?: () => number;
};

const DEFAULT_CONFIG: TradeExecutorConfig = {
  hardCapUsd: 150,
  minTradeUsd: 10,
  signalMaxAgeSeconds: 15 * 60,
  reentryCooldownSeconds: 0,
  expiryBySignalClass: {
    discovery: 24 * 60 * 60,
    alpha: 168 * 60 * 60,
    manual: 365 * 24 * 60 * 60
  }
};

/** Rejections that are routine filtering rather than something the user should hear about. */
const SILENT_REASONS: ReadonlySet<RejectReason> = new Set([
  'invalid_signal',
  'stale_signal',
  'trading_disabled',
  'grade_filtered',
  'duplicate'
]);

/** Classes that replace each other on the same asset; manual positions are never swapped out. */
const SWAPPABLE_CLASSES: readonly SignalClass[] = ['discovery', 'alpha'];

type Rejection = Extract<ExecutionResult, { status: 'REJECTED' }>;

function reject(reason: RejectReason, message: string): Rejection {
  return { status: 'REJECTED', reason, message };
}

export class TradeExecutor {
  private readonly ledger: PortfolioLedger;
  private readonly priceOracle: PriceOracle;
  private readonly eventBus: EventBus;
  private readonly config: TradeExecutorConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: TradeExecutorOptions) {
    this.ledger = options.ledger;
    this.priceOracle = options.priceOracle;
    this.eventBus = options.eventBus;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger ?? pino({ name: 'trade-executor' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Turns one signal into a position for one user. Expected refusals come
   * back as REJECTED results; only unexpected failures throw.
   */
  async execute(signalInput: unknown, prefsInput: unknown): Promise<ExecutionResult> {
    const prefsResult = userPrefsSchema.safeParse(prefsInput);
    if (!prefsResult.success) {
      throw new ValidationError(`Invalid user preferences: ${prefsResult.error.message}`);
    }
    const prefs = prefsResult.data;

    const signalResult = signalSchema.safeParse(signalInput);
    if (!signalResult.success) {
      return this.finish(prefs.userId, null, reject('invalid_signal', signalResult.error.message));
    }
    const signal = signalResult.data;

    try {
      const result = await this.executeValidated(signal, prefs);
      return this.finish(prefs.userId, signal, result);
    } catch (error: unknown) {
      if (error instanceof CorruptedStateError) {
        return this.finish(prefs.userId, signal, reject('portfolio_halted', error.message));
      }
      throw error;
    }
  }

  /** Fans one signal out to many users; one user's failure never affects another. */
  async executeForUsers(signalInput: unknown, users: unknown[]): Promise<UserExecution[]> {
    const settled = await Promise.allSettled(users.map((prefs) => this.execute(signalInput, prefs)));

    return settled.map((outcome, index): UserExecution => {
      const userId = userIdOf(users[index]);
      if (outcome.status === 'fulfilled') {
        return { userId, status: 'done', result: outcome.value };
      }

      const message = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      this.logger.error({ userId, err: outcome.reason }, 'trade execution failed');
      return { userId, status: 'failed', error: message };
    });
  }

  private async executeValidated(signal: Signal, prefs: UserPrefs): Promise<ExecutionResult> {
    const now = this.now();
    const userId = prefs.userId;
    const key = { assetId: signal.assetId, signalClass: signal.signalClass };
    const keyId = positionKeyId(key);

    const ageMs = now - signal.gradedAt;
    if (ageMs > this.config.signalMaxAgeSeconds * 1000) {
      return reject('stale_signal', `Signal graded ${Math.round(ageMs / 1000)}s ago`);
    }

    if (!prefs.tradingEnabled || !prefs.signalClasses.includes(signal.signalClass)) {
      return reject('trading_disabled', `Trading ${signal.signalClass} signals is disabled`);
    }

    if (prefs.grades && prefs.grades.length > 0 && (!signal.grade || !prefs.grades.includes(signal.grade))) {
      return reject('grade_filtered', `Grade ${signal.grade ?? 'none'} is not enabled`);
    }

    if (this.ledger.isHalted(userId)) {
      return reject('portfolio_halted', this.ledger.haltReason(userId) ?? 'Portfolio is halted');
    }

    const portfolio = await this.ledger.ensurePortfolio(userId, { reserveUsd: prefs.reserveUsd });
    if (prefs.reserveUsd !== undefined && prefs.reserveUsd !== portfolio.reserve) {
      await this.ledger.setReserve(userId, prefs.reserveUsd);
    }

    if (this.ledger.hasOpenPosition(userId, key)) {
      return reject('duplicate', `Position ${keyId} is already open`);
    }

    const lastClosedAt = this.ledger.lastClosedAt(userId, key);
    const cooldownMs = this.config.reentryCooldownSeconds * 1000;
    if (lastClosedAt !== null && now - lastClosedAt < cooldownMs) {
      return reject('cooldown', `Position ${keyId} closed ${Math.round((now - lastClosedAt) / 1000)}s ago`);
    }

    const available = this.ledger.getAvailableCapital(userId);
    const sizeUsd = this.sizeTrade(prefs, available);

    if (sizeUsd <= 0 || sizeUsd < this.config.minTradeUsd) {
      return reject(
        'below_minimum',
        `Trade size $${sizeUsd.toFixed(2)} is below the minimum $${this.config.minTradeUsd.toFixed(2)}`
      );
    }

    if (available < sizeUsd) {
      return reject(
        'insufficient_funds',
        `Available capital $${available.toFixed(2)} is below the trade size $${sizeUsd.toFixed(2)}`
      );
    }

    const reserve = this.ledger.snapshot(userId)?.reserve ?? 0;
    if (available < reserve) {
      return reject(
        'reserve_floor',
        `Available capital $${available.toFixed(2)} is below the reserve $${reserve.toFixed(2)}`
      );
    }

    const entryPrice = signal.price ?? (await this.quote(signal.assetId));
    if (entryPrice === null) {
      return reject('price_unavailable', `No price for ${signal.assetId}`);
    }

    const swapped = prefs.swapOnClassChange ? await this.swapOtherClass(userId, signal, entryPrice, now) : null;

    try {
      const position = await this.ledger.openPosition(userId, {
        key,
        symbol: signal.symbol,
        sizeUsd,
        entryPrice,
        exitConfig: this.exitConfigFor(signal.signalClass, prefs),
        openedAt: now
      });

      this.eventBus.emit('position.opened', {
        userId,
        position,
        availableCapital: this.ledger.getAvailableCapital(userId)
      });

      return { status: 'OPENED', position, swapped };
    } catch (error: unknown) {
      if (error instanceof DuplicatePositionError) {
        return reject('duplicate', error.message);
      }
      if (error instanceof InsufficientFundsError) {
        return reject('insufficient_funds', error.message);
      }
      throw error;
    }
  }

  private sizeTrade(prefs: UserPrefs, available: number): number {
    const raw = prefs.sizing.mode === 'fixed' ? prefs.sizing.amountUsd : (prefs.sizing.percent / 100) * available;
    return Math.min(raw, this.config.hardCapUsd);
  }

  private async quote(assetId: string): Promise<number | null> {
    try {
      const quote = await this.priceOracle.getPrice(assetId);
      return quote && quote.price > 0 ? quote.price : null;
    } catch (error: unknown) {
      this.logger.warn({ assetId, err: error }, 'entry price lookup failed');
      return null;
    }
  }

  /** Closes the same asset held under another signal class at the new entry price. */
  private async swapOtherClass(
    userId: string,
    signal: Signal,
    price: number,
    now: number
  ): Promise<ClosedPosition | null> {
    if (!SWAPPABLE_CLASSES.includes(signal.signalClass)) {
      return null;
    }
    const others = SWAPPABLE_CLASSES.filter((signalClass) => signalClass !== signal.signalClass);

    for (const signalClass of others) {
      const otherKey = { assetId: signal.assetId, signalClass };
      const other = this.ledger.findOpenPosition(userId, otherKey);
      if (!other) {
        continue;
      }

      const realizedRoi = Math.max(-1, computeRoi(other.entryPrice, price));
      let closed: ClosedPosition;
      try {
        closed = await this.ledger.closePosition(userId, otherKey, {
          exitPrice: price,
          realizedRoi,
          reason: 'signalSwap',
          closedAt: now
        });
      } catch (error: unknown) {
        // a concurrent delivery of the same signal already swapped it
        if (error instanceof PositionNotFoundError) {
          continue;
        }
        throw error;
      }
      const portfolio = this.ledger.snapshot(userId);

      this.logger.info(
        { userId, from: positionKeyId(otherKey), to: signal.signalClass, realizedRoi },
        'position swapped to new signal class'
      );
      this.eventBus.emit('position.closed', {
        userId,
        position: closed,
        realizedRoi,
        capital: portfolio?.capital ?? 0
      });

      return closed;
    }

    return null;
  }

  private exitConfigFor(signalClass: SignalClass, prefs: UserPrefs): ExitConfig {
    return {
      takeProfitMode: prefs.takeProfitMode,
      takeProfitValue: prefs.takeProfitValue,
      stopLossPercent: prefs.stopLossPercent,
      expiryDurationMs: this.config.expiryBySignalClass[signalClass] * 1000
    };
  }

  private finish(userId: string, signal: Signal | null, result: ExecutionResult): ExecutionResult {
    if (result.status === 'OPENED') {
      this.logger.info(
        {
          userId,
          positionKey: positionKeyId(result.position.key),
          sizeUsd: result.position.sizeUsd,
          entryPrice: result.position.entryPrice
        },
        'trade opened'
      );
      return result;
    }

    if (SILENT_REASONS.has(result.reason)) {
      this.logger.debug({ userId, reason: result.reason, detail: result.message }, 'signal skipped');
      return result;
    }

    this.logger.info({ userId, reason: result.reason, detail: result.message }, 'trade rejected');
    if (signal) {
      this.eventBus.emit('trade.rejected', {
        userId,
        signal: { assetId: signal.assetId, signalClass: signal.signalClass, gradedAt: signal.gradedAt },
        reason: result.reason,
        message: result.message
      });
    }

    return result;
  }
}

function userIdOf(prefs: unknown): string {
  if (typeof prefs === 'object' && prefs !== null) {
    const userId: unknown = Reflect.get(prefs, 'userId');
    if (typeof userId === 'string') {
      return userId;
    }
  }

  return 'unknown';
}
