import type { OpenPosition, Portfolio } from '../domain/models.js';
import { computeRoi, positionKeyId } from '../domain/models.js';

export type PositionValuation = {
  positionKey: string;
  symbol: string;
  signalClass: OpenPosition['signalClass'];
  entryPrice: number;
  markPrice: number;
  /** True when no live price was supplied and the entry price stands in. */
  stale: boolean;
  sizeUsd: number;
  marketValueUsd: number;
  unrealizedPnlUsd: number;
  unrealizedRoi: number;
};

export type PortfolioValuation = {
  userId: string;
  capital: number;
  availableCapital: number;
  reserve: number;
  costBasisUsd: number;
  marketValueUsd: number;
  unrealizedPnlUsd: number;
  unrealizedRoi: number;
  equityUsd: number;
  realizedPnl: number;
  positions: PositionValuation[];
};

/**
 * Marks every open position to `prices` (keyed by asset id). Positions without
 * a price are valued at entry and flagged stale.
 */
export function valuatePortfolio(portfolio: Portfolio, prices: ReadonlyMap<string, number>): PortfolioValuation {
  const positions = Object.values(portfolio.positions).map((position) => valuatePosition(position, prices));

  const costBasisUsd = positions.reduce((sum, item) => sum + item.sizeUsd, 0);
  const marketValueUsd = positions.reduce((sum, item) => sum + item.marketValueUsd, 0);
  const unrealizedPnlUsd = marketValueUsd - costBasisUsd;

  return {
    userId: portfolio.userId,
    capital: portfolio.capital,
    availableCapital: Math.max(0, portfolio.capital - portfolio.reserve),
    reserve: portfolio.reserve,
    costBasisUsd,
    marketValueUsd,
    unrealizedPnlUsd,
    unrealizedRoi: costBasisUsd > 0 ? unrealizedPnlUsd / costBasisUsd : 0,
    equityUsd: portfolio.capital + marketValueUsd,
    realizedPnl: portfolio.realizedPnl,
    positions
  };
}

function valuatePosition(position: OpenPosition, prices: ReadonlyMap<string, number>): PositionValuation {
  const quoted = prices.get(position.key.assetId);
  const markPrice = quoted !== undefined && quoted > 0 ? quoted : position.entryPrice;
  const stale = markPrice !== quoted;
  const unrealizedRoi = computeRoi(position.entryPrice, markPrice);
  const marketValueUsd = position.sizeUsd * (1 + unrealizedRoi);

  return {
    positionKey: positionKeyId(position.key),
    symbol: position.symbol,
    signalClass: position.signalClass,
    entryPrice: position.entryPrice,
    markPrice,
    stale,
    sizeUsd: position.sizeUsd,
    marketValueUsd,
    unrealizedPnlUsd: marketValueUsd - position.sizeUsd,
    unrealizedRoi
  };
}
