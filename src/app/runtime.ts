import type { Logger } from 'pino';

import { OutcomeStatsService, LedgerOutcomeSource, SupabaseOutcomeSource, type OutcomeHistorySource } from '../analytics/outcomeHistory.js';
import { loadSupabaseEnv } from '../config/env.js';
import { loadConfig, loadEngineConfig, type AppConfig, type EngineConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import { EventBus } from '../events/eventBus.js';
import { TradeExecutor } from '../execution/tradeExecutor.js';
import { LoggerNotificationSink, attachNotificationSink, type NotificationSink } from '../notifications/notificationSink.js';
import { PortfolioLedger } from '../portfolio/portfolioLedger.js';
import { PositionMonitor } from '../portfolio/positionMonitor.js';
import { JupiterPriceClient } from '../pricing/jupiterPriceClient.js';
import type { PriceOracle } from '../pricing/priceOracle.js';
import type { DurableStore } from '../storage/durableStore.js';
import { MemoryStore } from '../storage/memoryStore.js';
import { getSupabaseClient } from '../storage/supabase.js';
import { SupabaseStore } from '../storage/supabaseStore.js';
import { StateSynchronizer, type LoadReport } from '../sync/stateSynchronizer.js';

import {
  InMemorySignalSource,
  JsonFileUserDirectory,
  StaticUserDirectory,
  type SignalSource,
  type UserDirectory
} from './sources.js';

export type RuntimeOptions = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  store?: DurableStore;
  priceOracle?: PriceOracle;
  outcomeSource?: OutcomeHistorySource;
  signalSource?: SignalSource;
  userDirectory?: UserDirectory;
  notificationSink?: NotificationSink;
  now?: () => number;
};

export type RuntimeContext = {
  appConfig: AppConfig;
  engineConfig: EngineConfig;
  logger: Logger;
  eventBus: EventBus;
  store: DurableStore;
  ledger: PortfolioLedger;
  synchronizer: StateSynchronizer;
  priceOracle: PriceOracle;
  outcomeStats: OutcomeStatsService;
  executor: TradeExecutor;
  monitor: PositionMonitor;
  signalSource: SignalSource;
  userDirectory: UserDirectory;
  loadReport: LoadReport;
  /** Starts the monitor and sync loops and begins consuming signals. */
  start(): void;
  /** Stops consuming signals, stops the loops and flushes state. */
  shutdown(): Promise<void>;
};

export async function bootRuntime(options: RuntimeOptions = {}): Promise<RuntimeContext> {
  const env = options.env ?? process.env;
  const now = options.now ?? Date.now;

  const appConfig = loadConfig(env);
  const engineConfig = loadEngineConfig(env);
  const logger = options.logger ?? createLogger(appConfig);

  const boot = (step: string) => logger.info({ step }, `boot: ${step}`);

  try {
    boot('1.Config');
    const supabaseEnv = loadSupabaseEnv(env);
    const supabase = supabaseEnv ? getSupabaseClient(supabaseEnv) : null;

    boot('2.DurableStore');
    const store =
      options.store ??
      (supabase && supabaseEnv
        ? new SupabaseStore({
            client: supabase,
            table: supabaseEnv.SUPABASE_PORTFOLIO_TABLE,
            logger: logger.child({ component: 'supabase-store' }),
            now
          })
        : new MemoryStore(now));
    if (!options.store && !supabase) {
      logger.warn('Supabase not configured; portfolios are kept in memory only');
    }

    boot('3.EventBus');
    const eventBus = new EventBus({ queueEmits: true });
    eventBus.on('handler.failed', (failure) => {
      logger.warn(
        { sourceEvent: failure.sourceEvent, errorName: failure.errorName, payloadHash: failure.payloadHash },
        `event handler failed: ${failure.message}`
      );
    });

    boot('4.PortfolioLedger');
    const ledger = new PortfolioLedger({
      config: {
        startingCapitalUsd: engineConfig.startingCapitalUsd,
        defaultReservePercent: engineConfig.defaultReservePercent,
        pageSize: engineConfig.pageSize
      },
      logger: logger.child({ component: 'ledger' }),
      now
    });

    boot('5.StateSynchronizer');
    const synchronizer = new StateSynchronizer({
      ledger,
      store,
      eventBus,
      config: { intervalMs: engineConfig.syncIntervalSeconds * 1000 },
      logger: logger.child({ component: 'sync' })
    });
    const loadReport = await synchronizer.loadAll();

    boot('6.PriceOracle');
    const priceOracle =
      options.priceOracle ??
      new JupiterPriceClient({
        baseUrl: appConfig.PRICE_API_BASE_URL,
        logger: logger.child({ component: 'price-client' }),
        now
      });

    boot('7.OutcomeStats');
    const outcomeSource =
      options.outcomeSource ??
      (supabase && supabaseEnv
        ? new SupabaseOutcomeSource({
            client: supabase,
            table: supabaseEnv.SUPABASE_OUTCOME_TABLE,
            logger: logger.child({ component: 'outcome-source' })
          })
        : new LedgerOutcomeSource(ledger));
    const outcomeStats = new OutcomeStatsService({
      source: outcomeSource,
      refreshIntervalMs: engineConfig.outcomeRefreshSeconds * 1000,
      logger: logger.child({ component: 'outcome-stats' }),
      now
    });

    boot('8.TradeExecutor');
    const executor = new TradeExecutor({
      ledger,
      priceOracle,
      eventBus,
      config: {
        hardCapUsd: engineConfig.hardCapUsd,
        minTradeUsd: engineConfig.minTradeUsd,
        signalMaxAgeSeconds: engineConfig.signalMaxAgeSeconds,
        reentryCooldownSeconds: engineConfig.reentryCooldownSeconds,
        expiryBySignalClass: engineConfig.expiryBySignalClass
      },
      logger: logger.child({ component: 'executor' }),
      now
    });

    boot('9.PositionMonitor');
    const monitor = new PositionMonitor({
      ledger,
      priceOracle,
      outcomeStats,
      eventBus,
      config: {
        intervalMs: engineConfig.monitorIntervalSeconds * 1000,
        maxQuoteAgeSeconds: engineConfig.maxQuoteAgeSeconds,
        defaultTakeProfitPercent: engineConfig.defaultTakeProfitPercent,
        smartQuantileReach: engineConfig.smartQuantileReach
      },
      logger: logger.child({ component: 'monitor' }),
      now
    });

    boot('10.Notifications');
    const detachSink = attachNotificationSink(
      eventBus,
      options.notificationSink ?? new LoggerNotificationSink(logger.child({ component: 'notifications' }))
    );

    const signalSource = options.signalSource ?? new InMemorySignalSource();
    const userDirectory =
      options.userDirectory ??
      (appConfig.USER_PREFS_FILE ? new JsonFileUserDirectory(appConfig.USER_PREFS_FILE) : new StaticUserDirectory([]));

    let unsubscribeSignals: (() => void) | null = null;

    const start = (): void => {
      if (unsubscribeSignals) {
        return;
      }

      unsubscribeSignals = signalSource.subscribe(async (signal) => {
        try {
          const users = await userDirectory.getTradingUsers();
          const results = await executor.executeForUsers(signal, users);
          const opened = results.filter((item) => item.status === 'done' && item.result.status === 'OPENED').length;
          logger.debug({ users: users.length, opened }, 'signal processed');
        } catch (error: unknown) {
          logger.error({ err: error }, 'signal handling failed');
        }
      });

      monitor.start();
      synchronizer.start();
      logger.info('engine started');
    };

    const shutdown = async (): Promise<void> => {
      unsubscribeSignals?.();
      unsubscribeSignals = null;

      await monitor.stop();
      await eventBus.drain();
      const flushed = await synchronizer.stop();
      detachSink();

      logger.info({ saved: flushed.saved, failed: flushed.failed }, 'engine stopped');
    };

    logger.info({ loaded: loadReport.loaded, halted: loadReport.halted.length }, 'engine booted');

    return {
      appConfig,
      engineConfig,
      logger,
      eventBus,
      store,
      ledger,
      synchronizer,
      priceOracle,
      outcomeStats,
      executor,
      monitor,
      signalSource,
      userDirectory,
      loadReport,
      start,
      shutdown
    };
  } catch (error) {
    logger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}
