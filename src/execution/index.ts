export {
  TradeExecutor,
  type ExecutionResult,
  type RejectReason,
  type TradeExecutorConfig,
  type TradeExecutorOptions,
  type UserExecution
} from './tradeExecutor.js';
