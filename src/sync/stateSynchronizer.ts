import Bottleneck from 'bottleneck';
import type { Logger } from 'pino';
import pino from 'pino';

import { CorruptedStateError, StorageConflictError, describeError } from '../domain/errors.js';
import type { Portfolio } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { PortfolioLedger } from '../portfolio/portfolioLedger.js';
import { RecurringTask } from '../scheduler/recurringTask.js';
import type { DurableStore, SnapshotRecord } from '../storage/durableStore.js';
import { decodeSnapshot } from '../storage/snapshotCodec.js';

export type PersistOutcome = 'saved' | 'unchanged' | 'conflict' | 'halted' | 'missing';

export type LoadReport = {
  loaded: number;
  halted: string[];
};

export type FlushReport = {
  saved: number;
  unchanged: number;
  conflicts: number;
  failed: number;
};

export type ReconcileStrategy = 'remote' | 'local';

export type StateSynchronizerOptions = {
  ledger: PortfolioLedger;
  store: DurableStore;
  eventBus: EventBus;
  config?: Partial<{ intervalMs: number }>;
  logger?: Logger;
};

/**
 * Moves portfolios between the ledger and durable storage. Saves are
 * compare-and-set on the last version known to be stored; a conflict halts
 * that user's portfolio until `reconcile` is called, and nothing is merged.
 */
export class StateSynchronizer {
  private readonly ledger: PortfolioLedger;
  private readonly store: DurableStore;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly task: RecurringTask;
  private readonly queues = new Bottleneck.Group({ maxConcurrent: 1 });
  private readonly savedVersions = new Map<string, number>();
  private readonly conflicted = new Set<string>();
  private unsubscribe: (() => void) | null = null;

  constructor(options: StateSynchronizerOptions) {
    this.ledger = options.ledger;
    this.store = options.store;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? pino({ name: 'state-synchronizer' });
    this.task = new RecurringTask({
      name: 'state-sync',
      intervalMs: options.config?.intervalMs ?? 60_000,
      logger: this.logger,
      run: async () => {
        await this.flush();
      }
    });
  }

  /** Restores every stored portfolio. Must finish before trading starts. */
  async loadAll(): Promise<LoadReport> {
    const records = await this.store.loadAll();
    const report: LoadReport = { loaded: 0, halted: [] };

    for (const record of records) {
      try {
        await this.install(record);
        report.loaded += 1;
      } catch (error: unknown) {
        if (!(error instanceof CorruptedStateError)) {
          throw error;
        }

        this.haltUser(record.userId, error.message);
        report.halted.push(record.userId);
      }
    }

    this.logger.info({ loaded: report.loaded, halted: report.halted.length }, 'portfolios restored');
    return report;
  }

  async persist(userId: string): Promise<PersistOutcome> {
    return this.queues.key(userId).schedule(() => this.persistNow(userId));
  }

  async flush(): Promise<FlushReport> {
    const userIds = this.ledger.listUserIds();
    const settled = await Promise.allSettled(userIds.map((userId) => this.persist(userId)));
    const report: FlushReport = { saved: 0, unchanged: 0, conflicts: 0, failed: 0 };

    settled.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        report.failed += 1;
        this.logger.error({ userId: userIds[index], err: outcome.reason }, 'portfolio persist failed');
        return;
      }

      if (outcome.value === 'saved') {
        report.saved += 1;
      } else if (outcome.value === 'conflict') {
        report.conflicts += 1;
      } else {
        report.unchanged += 1;
      }
    });

    if (report.saved > 0 || report.failed > 0 || report.conflicts > 0) {
      this.logger.info(report, 'state flushed');
    }
    return report;
  }

  /** Starts periodic saves and saves right after every close. */
  start(): void {
    if (!this.unsubscribe) {
      this.unsubscribe = this.eventBus.on('position.closed', async ({ userId }) => {
        try {
          await this.persist(userId);
        } catch (error: unknown) {
          this.logger.error({ userId, err: error }, 'persist after close failed');
        }
      });
    }

    this.task.start();
  }

  /** Stops the loop and performs a final flush. */
  async stop(): Promise<FlushReport> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.task.stop();
    return this.flush();
  }

  isConflicted(userId: string): boolean {
    return this.conflicted.has(userId);
  }

  getSavedVersion(userId: string): number {
    return this.savedVersions.get(userId) ?? 0;
  }

  /**
   * Manual repair after a conflict or a corrupted load. `remote` adopts the
   * stored copy; `local` overwrites storage with the ledger's copy.
   */
  async reconcile(userId: string, strategy: ReconcileStrategy): Promise<Portfolio> {
    return this.queues.key(userId).schedule(async () => {
      const record = await this.store.load(userId);

      if (strategy === 'remote') {
        if (!record) {
          throw new Error(`No stored portfolio for ${userId}`);
        }

        const restored = await this.install(record);
        this.conflicted.delete(userId);
        this.logger.warn({ userId, version: restored.version }, 'portfolio reconciled from storage');
        return restored;
      }

      const local = this.ledger.snapshot(userId);
      if (!local) {
        throw new Error(`No local portfolio for ${userId}`);
      }

      const remoteVersion = record?.version ?? 0;
      const repaired = await this.ledger.repair({ ...local, version: Math.max(local.version, remoteVersion + 1) });
      const result = await this.store.save(userId, repaired, remoteVersion);

      if (result.status === 'conflict') {
        this.handleConflict(userId, repaired.version, remoteVersion, result.remoteVersion);
        throw new StorageConflictError(userId, remoteVersion, result.remoteVersion);
      }

      this.savedVersions.set(userId, result.version);
      this.conflicted.delete(userId);
      this.logger.warn({ userId, version: result.version }, 'storage overwritten with local portfolio');
      return repaired;
    });
  }

  private async persistNow(userId: string): Promise<PersistOutcome> {
    if (this.conflicted.has(userId)) {
      return 'conflict';
    }

    if (this.ledger.isHalted(userId)) {
      return 'halted';
    }

    const snapshot = this.ledger.snapshot(userId);
    if (!snapshot) {
      return 'missing';
    }

    const expectedVersion = this.savedVersions.get(userId) ?? 0;
    if (snapshot.version === expectedVersion) {
      return 'unchanged';
    }

    const result = await this.store.save(userId, snapshot, expectedVersion);
    if (result.status === 'conflict') {
      this.handleConflict(userId, snapshot.version, expectedVersion, result.remoteVersion);
      return 'conflict';
    }

    this.savedVersions.set(userId, result.version);
    this.logger.debug({ userId, version: result.version }, 'portfolio saved');
    return 'saved';
  }

  private async install(record: SnapshotRecord): Promise<Portfolio> {
    const payload = decodeSnapshot(record);
    const restored = await this.ledger.restore(payload, record.userId);
    this.savedVersions.set(record.userId, record.version);
    return restored;
  }

  private handleConflict(userId: string, localVersion: number, expectedVersion: number, remoteVersion: number): void {
    const error = new StorageConflictError(userId, expectedVersion, remoteVersion);
    this.logger.error({ userId, localVersion, expectedVersion, remoteVersion }, error.message);

    this.conflicted.add(userId);
    this.eventBus.emit('sync.conflict', { userId, localVersion, expectedVersion, remoteVersion });
    this.haltUser(userId, describeError(error));
  }

  private haltUser(userId: string, reason: string): void {
    this.ledger.halt(userId, reason);
    this.eventBus.emit('portfolio.halted', { userId, reason });
  }
}
