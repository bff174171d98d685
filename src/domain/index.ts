export {
  closeReasonSchema,
  closedPositionSchema,
  exitConfigSchema,
  gradeSchema,
  openPositionSchema,
  portfolioSchema,
  positionKeySchema,
  signalClassSchema,
  signalSchema,
  sizingSchema,
  takeProfitModeSchema,
  tradeStatsSchema,
  userPrefsSchema,
  computeRoi,
  emptyTradeStats,
  hashObject,
  positionKeyId
} from './models.js';

export type {
  ClosedPosition,
  CloseReason,
  ExitConfig,
  Grade,
  OpenPosition,
  Portfolio,
  Position,
  PositionKey,
  PositionStatus,
  Signal,
  SignalClass,
  SignalInput,
  Sizing,
  TakeProfitMode,
  TradeStats,
  UserPrefs,
  UserPrefsInput
} from './models.js';

export {
  CorruptedStateError,
  DuplicatePositionError,
  EngineError,
  InsufficientFundsError,
  PositionNotFoundError,
  PriceUnavailableError,
  StorageConflictError,
  ValidationError,
  describeError,
  isEngineError,
  type EngineErrorCode
} from './errors.js';
