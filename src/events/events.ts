import type { ClosedPosition, OpenPosition, Signal } from '../domain/models.js';
import type { RejectReason } from '../execution/tradeExecutor.js';

export type PositionOpenedPayload = {
  userId: string;
  position: OpenPosition;
  /** Available capital right after the open. */
  availableCapital: number;
};

export type PositionClosedPayload = {
  userId: string;
  position: ClosedPosition;
  realizedRoi: number;
  capital: number;
};

export type TradeRejectedPayload = {
  userId: string;
  signal: Pick<Signal, 'assetId' | 'signalClass' | 'gradedAt'>;
  reason: RejectReason;
  message: string;
};

export type PriceUnavailablePayload = {
  assetId: string;
  reason: string;
};

export type SyncConflictPayload = {
  userId: string;
  localVersion: number;
  expectedVersion: number;
  remoteVersion: number;
};

export type PortfolioHaltedPayload = {
  userId: string;
  reason: string;
};

export type HandlerFailedPayload = {
  ts: number;
  sourceEvent: TradingEventName;
  message: string;
  errorName: string;
  payloadHash: string;
};

export type TradingEventMap = {
  'trade.rejected': TradeRejectedPayload;
  'position.opened': PositionOpenedPayload;
  'position.closed': PositionClosedPayload;
  'price.unavailable': PriceUnavailablePayload;
  'sync.conflict': SyncConflictPayload;
  'portfolio.halted': PortfolioHaltedPayload;
  'handler.failed': HandlerFailedPayload;
};

export type TradingEventName = keyof TradingEventMap;
export type EventHandler<TPayload> = (payload: TPayload) => void | Promise<void>;
