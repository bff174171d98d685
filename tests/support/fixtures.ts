import pino from 'pino';

import type { ExitConfig, UserPrefsInput } from '../../src/domain/models.js';
import { PortfolioLedger } from '../../src/portfolio/portfolioLedger.js';

export const T0 = 1_700_000_000_000;

export function silentLogger() {
  return pino({ enabled: false });
}

export function makeLedger(now: () => number = () => T0, pageSize = 10): PortfolioLedger {
  return new PortfolioLedger({
    config: { startingCapitalUsd: 1000, defaultReservePercent: 0, pageSize },
    logger: silentLogger(),
    now
  });
}

export function exitConfig(overrides: Partial<ExitConfig> = {}): ExitConfig {
  return {
    takeProfitMode: 'fixed-percent',
    takeProfitValue: 50,
    stopLossPercent: 10,
    expiryDurationMs: 24 * 60 * 60 * 1000,
    ...overrides
  };
}

export function prefs(overrides: Partial<UserPrefsInput> = {}): UserPrefsInput {
  return {
    userId: 'user-1',
    tradingEnabled: true,
    sizing: { mode: 'fixed', amountUsd: 50 },
    ...overrides
  };
}

export function signal(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    assetId: 'mint-a',
    signalClass: 'discovery',
    gradedAt: T0 - 1000,
    symbol: 'AAA',
    price: 1,
    grade: 'HIGH',
    ...overrides
  };
}

/** Polls until `check` passes or the timeout elapses. */
export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
