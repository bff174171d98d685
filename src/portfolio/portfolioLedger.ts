import Bottleneck from 'bottleneck';
import pino, { type Logger } from 'pino';

import {
  CorruptedStateError,
  DuplicatePositionError,
  InsufficientFundsError,
  PositionNotFoundError,
  ValidationError
} from '../domain/errors.js';
import type {
  ClosedPosition,
  CloseReason,
  ExitConfig,
  OpenPosition,
  Portfolio,
  PositionKey
} from '../domain/models.js';
import { emptyTradeStats, hashObject, portfolioSchema, positionKeyId } from '../domain/models.js';

import { nextStatus } from './stateMachine.js';

export type OpenPositionInput = {
  key: PositionKey;
  symbol?: string;
  sizeUsd: number;
  entryPrice: number;
  exitConfig: ExitConfig;
  openedAt?: number;
};

export type ClosePositionInput = {
  exitPrice: number;
  /** Fractional ROI; the position is credited `sizeUsd * (1 + realizedRoi)`. */
  realizedRoi: number;
  reason: CloseReason;
  closedAt?: number;
  peakRoi?: number;
};

export type HistoryPage = {
  items: ClosedPosition[];
  page: number;
  totalPages: number;
  total: number;
};

export type LedgerPositionRef = {
  userId: string;
  position: OpenPosition;
};

export type PortfolioLedgerConfig = {
  startingCapitalUsd: number;
  defaultReservePercent: number;
  pageSize: number;
};

export type PortfolioLedgerOptions = {
  config?: Partial<PortfolioLedgerConfig>;
  logger?: Logger;
  now?: () => number;
};

const DEFAULT_CONFIG: PortfolioLedgerConfig = {
  startingCapitalUsd: 1000,
  defaultReservePercent: 0,
  pageSize: 10
};

const CONSERVATION_TOLERANCE = 1e-6;

/**
 * Authoritative in-memory record of every user's capital and positions.
 *
 * Mutations for one user run one at a time through a per-user queue and are
 * applied to a draft that replaces the stored portfolio only after the
 * conservation check passes, so readers never observe a partial mutation.
 */
export class PortfolioLedger {
  private readonly config: PortfolioLedgerConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly portfolios = new Map<string, Portfolio>();
  private readonly halted = new Map<string, string>();
  private readonly queues = new Bottleneck.Group({ maxConcurrent: 1 });
  private sequence = 0;

  constructor(options: PortfolioLedgerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger ?? pino({ name: 'portfolio-ledger' });
    this.now = options.now ?? Date.now;
  }

  /** Returns the user's portfolio, creating it with the starting capital on first interaction. */
  async ensurePortfolio(userId: string, options: { reserveUsd?: number } = {}): Promise<Portfolio> {
    const existing = this.portfolios.get(userId);
    if (existing) {
      return structuredClone(existing);
    }

    const reserveUsd =
      options.reserveUsd === undefined ? undefined : assertAmount(options.reserveUsd, 'reserveUsd', true);

    return this.queues.key(userId).schedule(async () => {
      const current = this.portfolios.get(userId);
      if (current) {
        return structuredClone(current);
      }

      const created = this.createPortfolio(userId);
      if (reserveUsd !== undefined) {
        created.reserve = reserveUsd;
      }
      created.version = 1;
      this.portfolios.set(userId, created);
      this.logger.info({ userId, capital: created.capital, reserve: created.reserve }, 'portfolio created');

      return structuredClone(created);
    });
  }

  async openPosition(userId: string, input: OpenPositionInput): Promise<OpenPosition> {
    const keyId = positionKeyId(input.key);
    const sizeUsd = assertAmount(input.sizeUsd, 'sizeUsd');
    const entryPrice = assertAmount(input.entryPrice, 'entryPrice');

    const { result: opened } = await this.mutate(userId, (draft): OpenPosition => {
      if (draft.positions[keyId]) {
        throw new DuplicatePositionError(keyId);
      }

      const available = availableOf(draft);
      if (available < sizeUsd) {
        throw new InsufficientFundsError(available, sizeUsd);
      }

      const openedAt = input.openedAt ?? this.now();
      this.sequence += 1;
      const position: OpenPosition = {
        id: `pos_${hashObject({ userId, keyId, openedAt, sequence: this.sequence }).slice(0, 12)}`,
        key: { ...input.key },
        symbol: input.symbol ?? input.key.assetId,
        signalClass: input.key.signalClass,
        entryPrice,
        sizeUsd,
        quantity: sizeUsd / entryPrice,
        openedAt,
        exitConfig: { ...input.exitConfig },
        status: 'open'
      };

      draft.positions[keyId] = position;
      draft.capital -= sizeUsd;
      return position;
    });

    this.logger.debug({ userId, positionKey: keyId, sizeUsd, entryPrice }, 'position opened');
    return structuredClone(opened);
  }

  async closePosition(userId: string, key: PositionKey, input: ClosePositionInput): Promise<ClosedPosition> {
    const keyId = positionKeyId(key);
    const exitPrice = assertAmount(input.exitPrice, 'exitPrice');
    if (!Number.isFinite(input.realizedRoi) || input.realizedRoi < -1) {
      throw new ValidationError(`realizedRoi must be a finite fraction >= -1, got ${input.realizedRoi}`);
    }

    const { result: closed } = await this.mutate(userId, (draft): ClosedPosition => {
      const position = draft.positions[keyId];
      if (!position || nextStatus(position.status, input.reason) !== 'closed') {
        throw new PositionNotFoundError(keyId);
      }

      const closedAt = input.closedAt ?? this.now();
      const proceeds = position.sizeUsd * (1 + input.realizedRoi);
      const pnlUsd = proceeds - position.sizeUsd;

      const record: ClosedPosition = {
        ...position,
        status: 'closed',
        closedAt,
        exitPrice,
        realizedRoi: input.realizedRoi,
        pnlUsd,
        closeReason: input.reason,
        peakRoi: Math.max(input.peakRoi ?? input.realizedRoi, input.realizedRoi),
        holdDurationMs: Math.max(0, closedAt - position.openedAt)
      };

      delete draft.positions[keyId];
      draft.capital += proceeds;
      draft.realizedPnl += pnlUsd;
      draft.history.push(record);

      const stats = draft.stats;
      stats.totalTrades += 1;
      stats.totalPnlUsd += pnlUsd;
      if (pnlUsd > 0) {
        stats.wins += 1;
      } else {
        stats.losses += 1;
      }
      stats.bestRoi = stats.totalTrades === 1 ? input.realizedRoi : Math.max(stats.bestRoi, input.realizedRoi);
      stats.worstRoi = stats.totalTrades === 1 ? input.realizedRoi : Math.min(stats.worstRoi, input.realizedRoi);
      return record;
    });

    this.logger.debug(
      { userId, positionKey: keyId, reason: input.reason, realizedRoi: input.realizedRoi },
      'position closed'
    );
    return structuredClone(closed);
  }

  async deposit(userId: string, amountUsd: number): Promise<Portfolio> {
    const amount = assertAmount(amountUsd, 'amountUsd');
    const { portfolio } = await this.mutate(userId, (draft) => {
      draft.capital += amount;
      draft.allocatedCapital += amount;
    });
    this.logger.info({ userId, amountUsd: amount }, 'capital deposited');
    return portfolio;
  }

  async setReserve(userId: string, reserveUsd: number): Promise<Portfolio> {
    const reserve = assertAmount(reserveUsd, 'reserveUsd', true);
    const { portfolio } = await this.mutate(userId, (draft) => {
      draft.reserve = reserve;
    });
    return portfolio;
  }

  getAvailableCapital(userId: string): number {
    const portfolio = this.portfolios.get(userId);
    return portfolio ? availableOf(portfolio) : 0;
  }

  snapshot(userId: string): Portfolio | null {
    const portfolio = this.portfolios.get(userId);
    return portfolio ? structuredClone(portfolio) : null;
  }

  getVersion(userId: string): number {
    return this.portfolios.get(userId)?.version ?? 0;
  }

  hasOpenPosition(userId: string, key: PositionKey): boolean {
    return Boolean(this.portfolios.get(userId)?.positions[positionKeyId(key)]);
  }

  findOpenPosition(userId: string, key: PositionKey): OpenPosition | null {
    const position = this.portfolios.get(userId)?.positions[positionKeyId(key)];
    return position ? structuredClone(position) : null;
  }

  /** Close time of the most recent closed position with this key, if any. */
  lastClosedAt(userId: string, key: PositionKey): number | null {
    const history = this.portfolios.get(userId)?.history ?? [];
    const keyId = positionKeyId(key);

    for (let index = history.length - 1; index >= 0; index -= 1) {
      const record = history[index];
      if (record && positionKeyId(record.key) === keyId) {
        return record.closedAt;
      }
    }

    return null;
  }

  getHistory(userId: string, page = 1): HistoryPage {
    const history = this.portfolios.get(userId)?.history ?? [];
    const pageSize = this.config.pageSize;
    const total = history.length;
    const totalPages = Math.max(1, Math.ceil(total / pageSize));
    const current = Math.min(Math.max(1, Math.floor(page)), totalPages);
    const newestFirst = [...history].reverse();
    const start = (current - 1) * pageSize;

    return {
      items: structuredClone(newestFirst.slice(start, start + pageSize)),
      page: current,
      totalPages,
      total
    };
  }

  listUserIds(): string[] {
    return [...this.portfolios.keys()];
  }

  /** Open positions of every portfolio that is not halted. */
  listOpenPositions(): LedgerPositionRef[] {
    const refs: LedgerPositionRef[] = [];

    for (const [userId, portfolio] of this.portfolios) {
      if (this.halted.has(userId)) {
        continue;
      }

      for (const position of Object.values(portfolio.positions)) {
        refs.push({ userId, position: structuredClone(position) });
      }
    }

    return refs;
  }

  halt(userId: string, reason: string): void {
    if (!this.halted.has(userId)) {
      this.logger.error({ userId, reason }, 'portfolio halted');
    }
    this.halted.set(userId, reason);
  }

  isHalted(userId: string): boolean {
    return this.halted.has(userId);
  }

  haltReason(userId: string): string | null {
    return this.halted.get(userId) ?? null;
  }

  /**
   * Installs a portfolio loaded from durable storage, keeping its version.
   * Fails with CorruptedStateError when the snapshot does not validate.
   */
  async restore(candidate: unknown, userIdHint?: string): Promise<Portfolio> {
    const portfolio = this.validateSnapshot(candidate, userIdHint);

    return this.queues.key(portfolio.userId).schedule(async () => {
      this.portfolios.set(portfolio.userId, portfolio);
      this.halted.delete(portfolio.userId);
      return structuredClone(portfolio);
    });
  }

  /** Manual repair of a halted portfolio: validates and installs the given state, then resumes it. */
  async repair(candidate: unknown): Promise<Portfolio> {
    const restored = await this.restore(candidate);
    this.logger.warn({ userId: restored.userId, version: restored.version }, 'portfolio repaired');
    return restored;
  }

  private validateSnapshot(candidate: unknown, userIdHint?: string): Portfolio {
    const parsed = portfolioSchema.safeParse(candidate);
    const userId = parsed.success ? parsed.data.userId : (userIdHint ?? 'unknown');

    if (!parsed.success) {
      const error = new CorruptedStateError(userId, `snapshot failed validation: ${parsed.error.message}`);
      if (userIdHint) {
        this.halt(userIdHint, error.message);
      }
      throw error;
    }

    for (const [keyId, position] of Object.entries(parsed.data.positions)) {
      if (positionKeyId(position.key) !== keyId) {
        this.halt(userId, `position stored under ${keyId} has key ${positionKeyId(position.key)}`);
        throw new CorruptedStateError(userId, `position stored under ${keyId} does not match its key`);
      }
    }

    const drift = conservationDrift(parsed.data);
    if (drift !== null) {
      this.halt(userId, drift);
      throw new CorruptedStateError(userId, drift);
    }

    return parsed.data;
  }

  private async mutate<TResult>(
    userId: string,
    apply: (draft: Portfolio) => TResult
  ): Promise<{ portfolio: Portfolio; result: TResult }> {
    return this.queues.key(userId).schedule(async () => {
      const haltReason = this.halted.get(userId);
      if (haltReason !== undefined) {
        throw new CorruptedStateError(userId, haltReason);
      }

      const current = this.portfolios.get(userId);
      const draft = current ? structuredClone(current) : this.createPortfolio(userId);

      const result = apply(draft);

      const drift = conservationDrift(draft);
      if (drift !== null) {
        this.halt(userId, drift);
        throw new CorruptedStateError(userId, drift);
      }

      draft.version += 1;
      draft.updatedAt = this.now();
      this.portfolios.set(userId, draft);

      return { portfolio: structuredClone(draft), result };
    });
  }

  private createPortfolio(userId: string): Portfolio {
    const now = this.now();
    const capital = this.config.startingCapitalUsd;

    return {
      userId,
      capital,
      reserve: (capital * this.config.defaultReservePercent) / 100,
      allocatedCapital: capital,
      realizedPnl: 0,
      positions: {},
      history: [],
      stats: emptyTradeStats(),
      version: 0,
      createdAt: now,
      updatedAt: now
    };
  }
}

function availableOf(portfolio: Pick<Portfolio, 'capital' | 'reserve'>): number {
  return Math.max(0, portfolio.capital - portfolio.reserve);
}

/** Sum of open position sizes in USD. */
export function openExposure(portfolio: Pick<Portfolio, 'positions'>): number {
  return Object.values(portfolio.positions).reduce((sum, position) => sum + position.sizeUsd, 0);
}

/** Describes a conservation violation, or returns null when the books balance. */
export function conservationDrift(portfolio: Portfolio): string | null {
  if (portfolio.capital < -CONSERVATION_TOLERANCE) {
    return `capital is negative (${portfolio.capital})`;
  }

  const held = portfolio.capital + openExposure(portfolio);
  const expected = portfolio.allocatedCapital + portfolio.realizedPnl;
  const tolerance = CONSERVATION_TOLERANCE * Math.max(1, Math.abs(expected));

  if (Math.abs(held - expected) > tolerance) {
    return `capital conservation broken: held ${held.toFixed(6)} != allocated+pnl ${expected.toFixed(6)}`;
  }

  return null;
}

function assertAmount(value: number, label: string, allowZero = false): number {
  if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
    throw new ValidationError(`${label} must be a ${allowZero ? 'non-negative' : 'positive'} finite number, got ${value}`);
  }

  return value;
}
