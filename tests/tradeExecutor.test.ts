import { EventBus } from '../src/events/eventBus.js';
import type { PositionOpenedPayload, TradeRejectedPayload } from '../src/events/events.js';
import { TradeExecutor, type ExecutionResult, type TradeExecutorConfig } from '../src/execution/tradeExecutor.js';
import type { PortfolioLedger } from '../src/portfolio/portfolioLedger.js';
import { StaticPriceOracle } from '../src/pricing/priceOracle.js';

import { T0, makeLedger, prefs, signal, silentLogger } from './support/fixtures.js';

type Harness = {
  ledger: PortfolioLedger;
  oracle: StaticPriceOracle;
  executor: TradeExecutor;
  opened: PositionOpenedPayload[];
  rejected: TradeRejectedPayload[];
};

function harness(config: Partial<TradeExecutorConfig> = {}): Harness {
  const now = () => T0;
  const ledger = makeLedger(now);
  const oracle = new StaticPriceOracle(now);
  const eventBus = new EventBus();
  const opened: PositionOpenedPayload[] = [];
  const rejected: TradeRejectedPayload[] = [];

  eventBus.on('position.opened', (payload) => {
    opened.push(payload);
  });
  eventBus.on('trade.rejected', (payload) => {
    rejected.push(payload);
  });

  const executor = new TradeExecutor({ ledger, priceOracle: oracle, eventBus, config, logger: silentLogger(), now });
  return { ledger, oracle, executor, opened, rejected };
}

function reasonOf(result: ExecutionResult): string {
  return result.status === 'REJECTED' ? result.reason : 'OPENED';
}

describe('TradeExecutor', () => {
  it('opens a position sized from preferences', async () => {
    const { ledger, executor, opened } = harness();

    const result = await executor.execute(signal(), prefs());

    expect(result.status).toBe('OPENED');
    if (result.status === 'OPENED') {
      expect(result.position.sizeUsd).toBe(50);
      expect(result.position.entryPrice).toBe(1);
      expect(result.position.symbol).toBe('AAA');
      expect(result.position.exitConfig).toEqual({
        takeProfitMode: 'median',
        takeProfitValue: null,
        stopLossPercent: null,
        expiryDurationMs: 86_400_000
      });
      expect(result.swapped).toBeNull();
    }
    expect(ledger.snapshot('user-1')?.capital).toBe(950);
    expect(opened).toHaveLength(1);
    expect(opened[0]?.availableCapital).toBe(950);
  });

  it('treats a redelivered signal as a no-op', async () => {
    const { ledger, executor } = harness();

    await executor.execute(signal(), prefs());
    const second = await executor.execute(signal(), prefs());

    expect(reasonOf(second)).toBe('duplicate');
    expect(Object.keys(ledger.snapshot('user-1')?.positions ?? {})).toEqual(['mint-a:discovery']);
    expect(ledger.snapshot('user-1')?.capital).toBe(950);
  });

  it('opens once when the same signal arrives concurrently', async () => {
    const { ledger, executor } = harness();

    const results = await Promise.all(Array.from({ length: 5 }, () => executor.execute(signal(), prefs())));

    expect(results.filter((result) => result.status === 'OPENED')).toHaveLength(1);
    expect(results.filter((result) => reasonOf(result) === 'duplicate')).toHaveLength(4);
    expect(ledger.snapshot('user-1')?.capital).toBe(950);
  });

  it('filters invalid, stale, disabled and off-grade signals silently', async () => {
    const { executor, rejected } = harness();

    expect(reasonOf(await executor.execute({ assetId: '' }, prefs()))).toBe('invalid_signal');
    expect(reasonOf(await executor.execute(signal({ gradedAt: T0 - 901_000 }), prefs()))).toBe('stale_signal');
    expect(reasonOf(await executor.execute(signal(), prefs({ tradingEnabled: false })))).toBe('trading_disabled');
    expect(reasonOf(await executor.execute(signal(), prefs({ signalClasses: ['alpha'] })))).toBe('trading_disabled');
    expect(reasonOf(await executor.execute(signal({ grade: 'LOW' }), prefs({ grades: ['CRITICAL', 'HIGH'] })))).toBe(
      'grade_filtered'
    );
    expect(rejected).toEqual([]);
  });

  it('sizes percent trades from available capital and clamps to the hard cap', async () => {
    const { executor } = harness({ hardCapUsd: 150 });

    const small = await executor.execute(signal(), prefs({ sizing: { mode: 'percent', percent: 10 } }));
    const capped = await executor.execute(
      signal({ assetId: 'mint-b' }),
      prefs({ sizing: { mode: 'percent', percent: 50 } })
    );

    expect(small.status === 'OPENED' && small.position.sizeUsd).toBe(100);
    expect(capped.status === 'OPENED' && capped.position.sizeUsd).toBe(150);
  });

  it('rejects trades below the minimum size', async () => {
    const { executor, rejected } = harness({ minTradeUsd: 10 });

    const result = await executor.execute(signal(), prefs({ sizing: { mode: 'fixed', amountUsd: 5 } }));

    expect(result).toEqual({
      status: 'REJECTED',
      reason: 'below_minimum',
      message: 'Trade size $5.00 is below the minimum $10.00'
    });
    expect(rejected.map((item) => item.reason)).toEqual(['below_minimum']);
  });

  it('rejects trades that do not fit above the reserve', async () => {
    const { executor } = harness();

    const insufficient = await executor.execute(
      signal(),
      prefs({ reserveUsd: 950, sizing: { mode: 'fixed', amountUsd: 100 } })
    );
    const floor = await executor.execute(signal(), prefs({ userId: 'user-2', reserveUsd: 600 }));

    expect(insufficient).toEqual({
      status: 'REJECTED',
      reason: 'insufficient_funds',
      message: 'Available capital $50.00 is below the trade size $100.00'
    });
    expect(reasonOf(floor)).toBe('reserve_floor');
  });

  it('prices from the oracle when the signal carries no price', async () => {
    const { oracle, executor, rejected } = harness();
    oracle.set('mint-a', 2.5);

    const quoted = await executor.execute(signal({ price: undefined }), prefs());
    const missing = await executor.execute(signal({ assetId: 'mint-z', price: undefined }), prefs());

    expect(quoted.status === 'OPENED' && quoted.position.entryPrice).toBe(2.5);
    expect(reasonOf(missing)).toBe('price_unavailable');
    expect(rejected.map((item) => item.signal.assetId)).toEqual(['mint-z']);
  });

  it('swaps a position to the new signal class', async () => {
    const { ledger, executor } = harness();
    await executor.execute(signal({ signalClass: 'alpha' }), prefs());

    const result = await executor.execute(signal({ price: 1.2 }), prefs());

    expect(result.status).toBe('OPENED');
    if (result.status === 'OPENED') {
      expect(result.swapped?.closeReason).toBe('signalSwap');
      expect(result.swapped?.realizedRoi).toBeCloseTo(0.2, 10);
    }
    const snapshot = ledger.snapshot('user-1');
    expect(Object.keys(snapshot?.positions ?? {})).toEqual(['mint-a:discovery']);
    expect(snapshot?.capital).toBeCloseTo(960, 10);
  });

  it('keeps both classes open when swapping is disabled', async () => {
    const { ledger, executor } = harness();
    await executor.execute(signal({ signalClass: 'alpha' }), prefs({ swapOnClassChange: false }));
    await executor.execute(signal(), prefs({ swapOnClassChange: false }));

    expect(Object.keys(ledger.snapshot('user-1')?.positions ?? {}).sort()).toEqual([
      'mint-a:alpha',
      'mint-a:discovery'
    ]);
  });

  it('swaps once when a class-change signal arrives twice concurrently', async () => {
    const { ledger, executor } = harness();
    await executor.execute(signal(), prefs());

    const results = await Promise.all([
      executor.execute(signal({ signalClass: 'alpha', price: 1.2 }), prefs()),
      executor.execute(signal({ signalClass: 'alpha', price: 1.2 }), prefs())
    ]);

    expect(results.map(reasonOf).sort()).toEqual(['OPENED', 'duplicate']);
    const snapshot = ledger.snapshot('user-1');
    expect(Object.keys(snapshot?.positions ?? {})).toEqual(['mint-a:alpha']);
    expect(snapshot?.history.map((record) => record.closeReason)).toEqual(['signalSwap']);
    expect(snapshot?.capital).toBeCloseTo(960, 10);
  });

  it('never swaps out a manual position', async () => {
    const { ledger, executor } = harness();
    const allClasses = prefs({ signalClasses: ['discovery', 'alpha', 'manual'] });
    await executor.execute(signal({ signalClass: 'manual' }), allClasses);

    const discovery = await executor.execute(signal(), allClasses);
    const manualAgain = await executor.execute(signal({ signalClass: 'manual', assetId: 'mint-b' }), allClasses);

    expect(discovery.status === 'OPENED' && discovery.swapped).toBeNull();
    expect(manualAgain.status === 'OPENED' && manualAgain.swapped).toBeNull();
    expect(Object.keys(ledger.snapshot('user-1')?.positions ?? {}).sort()).toEqual([
      'mint-a:discovery',
      'mint-a:manual',
      'mint-b:manual'
    ]);
  });

  it('rejects a zero-sized trade even without a minimum', async () => {
    const { executor } = harness({ minTradeUsd: 0, hardCapUsd: 1000 });
    await executor.execute(signal(), prefs({ sizing: { mode: 'fixed', amountUsd: 1000 } }));

    const result = await executor.execute(
      signal({ assetId: 'mint-b' }),
      prefs({ sizing: { mode: 'percent', percent: 10 } })
    );

    expect(result).toEqual({
      status: 'REJECTED',
      reason: 'below_minimum',
      message: 'Trade size $0.00 is below the minimum $0.00'
    });
  });

  it('enforces the re-entry cooldown', async () => {
    const { ledger, executor } = harness({ reentryCooldownSeconds: 600 });
    await executor.execute(signal(), prefs());
    await ledger.closePosition('user-1', { assetId: 'mint-a', signalClass: 'discovery' }, {
      exitPrice: 1,
      realizedRoi: 0,
      reason: 'manual'
    });

    expect(reasonOf(await executor.execute(signal(), prefs()))).toBe('cooldown');
  });

  it('rejects signals for a halted portfolio', async () => {
    const { ledger, executor } = harness();
    ledger.halt('user-1', 'storage conflict');

    const result = await executor.execute(signal(), prefs());

    expect(result).toEqual({ status: 'REJECTED', reason: 'portfolio_halted', message: 'storage conflict' });
  });

  it('fans a signal out to users independently', async () => {
    const { executor } = harness();

    const results = await executor.executeForUsers(signal(), [
      prefs({ userId: 'user-1' }),
      prefs({ userId: 'user-2', tradingEnabled: false }),
      { userId: 'user-3' }
    ]);

    expect(results.map((item) => item.userId)).toEqual(['user-1', 'user-2', 'user-3']);
    expect(results[0]?.status === 'done' && results[0].result.status).toBe('OPENED');
    expect(results[1]?.status === 'done' && reasonOf(results[1].result)).toBe('trading_disabled');
    expect(results[2]?.status).toBe('failed');
  });
});
