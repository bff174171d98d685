export * from './domain/index.js';
export * from './events/index.js';
export * from './execution/index.js';
export * from './indicators/index.js';
export * from './notifications/index.js';
export * from './portfolio/index.js';
export * from './pricing/index.js';
export * from './storage/index.js';
export {
  DEFAULT_EXIT_RULE_OPTIONS,
  evaluateExit,
  resolveTakeProfitTarget,
  type ExitDecision,
  type ExitRuleOptions,
  type ExitSignal,
  type TakeProfitTarget
} from './exits/exitRules.js';
export {
  LedgerOutcomeSource,
  OutcomeStatsService,
  SupabaseOutcomeSource,
  type OutcomeHistorySource
} from './analytics/outcomeHistory.js';
export { RecurringTask, type RecurringTaskOptions } from './scheduler/recurringTask.js';
export {
  StateSynchronizer,
  type FlushReport,
  type LoadReport,
  type PersistOutcome,
  type ReconcileStrategy
} from './sync/stateSynchronizer.js';
export { loadConfig, loadEngineConfig, type AppConfig, type EngineConfig } from './config/index.js';
export { createLogger } from './config/logger.js';
export { bootRuntime, type RuntimeContext, type RuntimeOptions } from './app/runtime.js';
export {
  InMemorySignalSource,
  JsonFileUserDirectory,
  StaticUserDirectory,
  type SignalSource,
  type UserDirectory
} from './app/sources.js';
