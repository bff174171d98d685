export {
  PortfolioLedger,
  conservationDrift,
  openExposure,
  type ClosePositionInput,
  type HistoryPage,
  type LedgerPositionRef,
  type OpenPositionInput,
  type PortfolioLedgerConfig,
  type PortfolioLedgerOptions
} from './portfolioLedger.js';
export {
  PositionMonitor,
  type MonitorCycleReport,
  type PeakRoiProvider,
  type PositionMonitorConfig,
  type PositionMonitorOptions
} from './positionMonitor.js';
export { nextStatus, type PositionEvent } from './stateMachine.js';
export { valuatePortfolio, type PortfolioValuation, type PositionValuation } from './valuation.js';
