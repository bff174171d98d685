import type { ExitConfig, OpenPosition, TakeProfitMode } from '../domain/models.js';
import { computeRoi } from '../domain/models.js';
import { mean, median, mode, reachQuantile, winningSamples } from '../indicators/outcomeStats.js';

export type ExitSignal = 'none' | 'takeProfitHit' | 'stopLossHit' | 'expired';

export type ExitDecision = {
  signal: ExitSignal;
  /** Fractional ROI at `currentPrice`. */
  roi: number;
  /** Take-profit target in percent that was in force for this evaluation. */
  targetPercent: number;
  targetSource: 'configured' | 'samples' | 'default';
};

export type ExitRuleOptions = {
  defaultTakeProfitPercent: number;
  smartQuantileReach: number;
};

export type TakeProfitTarget = {
  percent: number;
  source: ExitDecision['targetSource'];
};

/** Absorbs float error so a price exactly on a threshold counts as reaching it. */
const THRESHOLD_EPSILON = 1e-9;

export const DEFAULT_EXIT_RULE_OPTIONS: ExitRuleOptions = {
  defaultTakeProfitPercent: 50,
  smartQuantileReach: 0.75
};

const STATISTICS: Record<Exclude<TakeProfitMode, 'fixed-percent'>, (winners: number[], reach: number) => number> = {
  median: (winners) => median(winners),
  mean: (winners) => mean(winners),
  mode: (winners) => mode(winners),
  'smart-quantile': (winners, reach) => reachQuantile(winners, reach)
};

export function resolveTakeProfitTarget(
  exitConfig: Pick<ExitConfig, 'takeProfitMode' | 'takeProfitValue'>,
  historicalSamples: number[],
  options: ExitRuleOptions = DEFAULT_EXIT_RULE_OPTIONS
): TakeProfitTarget {
  if (exitConfig.takeProfitMode === 'fixed-percent') {
    return exitConfig.takeProfitValue !== null && exitConfig.takeProfitValue > 0
      ? { percent: exitConfig.takeProfitValue, source: 'configured' }
      : { percent: options.defaultTakeProfitPercent, source: 'default' };
  }

  const winners = winningSamples(historicalSamples);
  if (winners.length === 0) {
    return { percent: options.defaultTakeProfitPercent, source: 'default' };
  }

  const statistic = STATISTICS[exitConfig.takeProfitMode];
  return { percent: statistic(winners, options.smartQuantileReach), source: 'samples' };
}

/**
 * Decides whether an open position should close at `currentPrice`.
 * Stop-loss wins over take-profit, which wins over expiry.
 */
export function evaluateExit(
  position: Pick<OpenPosition, 'entryPrice' | 'openedAt' | 'exitConfig'>,
  currentPrice: number,
  now: number,
  historicalSamples: number[],
  options: ExitRuleOptions = DEFAULT_EXIT_RULE_OPTIONS
): ExitDecision {
  const roi = computeRoi(position.entryPrice, currentPrice);
  const target = resolveTakeProfitTarget(position.exitConfig, historicalSamples, options);
  const decide = (signal: ExitSignal): ExitDecision => ({
    signal,
    roi,
    targetPercent: target.percent,
    targetSource: target.source
  });

  const { stopLossPercent, expiryDurationMs } = position.exitConfig;
  if (stopLossPercent !== null && roi <= -stopLossPercent / 100 + THRESHOLD_EPSILON) {
    return decide('stopLossHit');
  }

  if (roi >= target.percent / 100 - THRESHOLD_EPSILON) {
    return decide('takeProfitHit');
  }

  if (now - position.openedAt >= expiryDurationMs) {
    return decide('expired');
  }

  return decide('none');
}
