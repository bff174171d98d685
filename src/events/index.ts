export { EventBus, type EventBusOptions } from './eventBus.js';

export type {
  EventHandler,
  HandlerFailedPayload,
  PortfolioHaltedPayload,
  PositionClosedPayload,
  PositionOpenedPayload,
  PriceUnavailablePayload,
  SyncConflictPayload,
  TradeRejectedPayload,
  TradingEventMap,
  TradingEventName
} from './events.js';
