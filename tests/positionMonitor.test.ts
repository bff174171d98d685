import type { ExitConfig } from '../src/domain/models.js';
import { EventBus } from '../src/events/eventBus.js';
import type { HandlerFailedPayload, PositionClosedPayload, PriceUnavailablePayload } from '../src/events/events.js';
import type { PortfolioLedger } from '../src/portfolio/portfolioLedger.js';
import { PositionMonitor } from '../src/portfolio/positionMonitor.js';
import { StaticPriceOracle, type PriceOracle } from '../src/pricing/priceOracle.js';

import { T0, exitConfig, makeLedger, silentLogger } from './support/fixtures.js';

type Harness = {
  clock: { now: number };
  ledger: PortfolioLedger;
  oracle: StaticPriceOracle;
  eventBus: EventBus;
  monitor: PositionMonitor;
  closed: PositionClosedPayload[];
  unavailable: PriceUnavailablePayload[];
};

function harness(samples: number[] = [], oracleOverride?: PriceOracle): Harness {
  const clock = { now: T0 };
  const now = () => clock.now;
  const ledger = makeLedger(now);
  const oracle = new StaticPriceOracle(now);
  const eventBus = new EventBus();
  const closed: PositionClosedPayload[] = [];
  const unavailable: PriceUnavailablePayload[] = [];

  eventBus.on('position.closed', (payload) => {
    closed.push(payload);
  });
  eventBus.on('price.unavailable', (payload) => {
    unavailable.push(payload);
  });

  const monitor = new PositionMonitor({
    ledger,
    priceOracle: oracleOverride ?? oracle,
    outcomeStats: { getPeakRois: async () => samples },
    eventBus,
    config: { maxQuoteAgeSeconds: 300 },
    logger: silentLogger(),
    now
  });

  return { clock, ledger, oracle, eventBus, monitor, closed, unavailable };
}

async function open(ledger: PortfolioLedger, assetId: string, config: Partial<ExitConfig> = {}): Promise<void> {
  await ledger.openPosition('user-1', {
    key: { assetId, signalClass: 'discovery' },
    sizeUsd: 50,
    entryPrice: 1,
    exitConfig: exitConfig(config)
  });
}

describe('PositionMonitor', () => {
  it('stops out at -15% and credits the remaining value', async () => {
    const { ledger, oracle, monitor, closed } = harness();
    await open(ledger, 'mint-a', { stopLossPercent: 10 });
    oracle.set('mint-a', 0.85);

    const report = await monitor.runCycle();

    expect(report).toMatchObject({ evaluated: 1, closed: 1, skipped: 0, failed: 0 });
    const snapshot = ledger.snapshot('user-1');
    expect(snapshot?.capital).toBeCloseTo(992.5, 10);
    expect(snapshot?.history[0]?.closeReason).toBe('stopLossHit');
    expect(snapshot?.history[0]?.realizedRoi).toBeCloseTo(-0.15, 10);
    expect(closed).toHaveLength(1);
    expect(closed[0]?.capital).toBeCloseTo(992.5, 10);
  });

  it('takes profit at the target derived from outcome history', async () => {
    const { ledger, oracle, monitor } = harness([10, 20, 30, 40]);
    await open(ledger, 'mint-a', { takeProfitMode: 'median', takeProfitValue: null });
    oracle.set('mint-a', 1.25);

    await monitor.runCycle();

    const record = ledger.snapshot('user-1')?.history[0];
    expect(record?.closeReason).toBe('takeProfitHit');
    expect(record?.pnlUsd).toBeCloseTo(12.5, 10);
  });

  it('expires positions with the ROI the price implies', async () => {
    const { clock, ledger, oracle, monitor } = harness();
    await open(ledger, 'mint-a', { expiryDurationMs: 60_000 });

    clock.now = T0 + 60_000;
    oracle.set('mint-a', 1.1);
    await monitor.runCycle();

    const record = ledger.snapshot('user-1')?.history[0];
    expect(record?.closeReason).toBe('expired');
    expect(record?.realizedRoi).toBeCloseTo(0.1, 10);
    expect(record?.holdDurationMs).toBe(60_000);
  });

  it('skips positions without a usable quote and keeps them open', async () => {
    const { clock, ledger, oracle, monitor, unavailable } = harness();
    await open(ledger, 'mint-a');
    await open(ledger, 'mint-b');
    oracle.set('mint-b', 0.5, T0);
    clock.now = T0 + 301_000;

    const report = await monitor.runCycle();

    expect(report).toMatchObject({ evaluated: 0, closed: 0, skipped: 2, failed: 0 });
    expect(unavailable).toEqual([
      { assetId: 'mint-a', reason: 'no quote' },
      { assetId: 'mint-b', reason: 'quote is 301s old' }
    ]);
    expect(ledger.listOpenPositions()).toHaveLength(2);
  });

  it('keeps going when the oracle fails for one asset', async () => {
    const quotes = new StaticPriceOracle(() => T0);
    quotes.set('mint-b', 0.5);
    const flaky: PriceOracle = {
      getPrice: async (assetId) => {
        if (assetId === 'mint-a') {
          throw new Error('upstream timeout');
        }
        return quotes.getPrice(assetId);
      }
    };
    const { ledger, monitor, unavailable } = harness([], flaky);
    await open(ledger, 'mint-a');
    await open(ledger, 'mint-b');

    const report = await monitor.runCycle();

    expect(report).toMatchObject({ evaluated: 1, closed: 1, skipped: 1, failed: 0 });
    expect(unavailable).toEqual([{ assetId: 'mint-a', reason: 'upstream timeout' }]);
    expect(ledger.findOpenPosition('user-1', { assetId: 'mint-a', signalClass: 'discovery' })).not.toBeNull();
  });

  it('records the peak ROI seen while the position was open', async () => {
    const { ledger, oracle, monitor } = harness();
    await open(ledger, 'mint-a', { stopLossPercent: 10 });

    oracle.set('mint-a', 1.3);
    await monitor.runCycle();
    oracle.set('mint-a', 0.85);
    await monitor.runCycle();

    const record = ledger.snapshot('user-1')?.history[0];
    expect(record?.closeReason).toBe('stopLossHit');
    expect(record?.peakRoi).toBeCloseTo(0.3, 10);
  });

  it('closes a position on request at the current quote', async () => {
    const { ledger, oracle, monitor, closed } = harness();
    await open(ledger, 'mint-a');
    oracle.set('mint-a', 1.2);

    const record = await monitor.closeNow('user-1', { assetId: 'mint-a', signalClass: 'discovery' });

    expect(record.closeReason).toBe('manual');
    expect(record.exitPrice).toBe(1.2);
    expect(closed).toHaveLength(1);
  });

  it('does not roll back a close when a subscriber fails', async () => {
    const { ledger, oracle, eventBus, monitor } = harness();
    const failures: HandlerFailedPayload[] = [];
    eventBus.on('handler.failed', (failure) => {
      failures.push(failure);
    });
    eventBus.on('position.closed', () => {
      throw new Error('notifier down');
    });
    await open(ledger, 'mint-a', { stopLossPercent: 10 });
    oracle.set('mint-a', 0.5);

    await monitor.runCycle();
    await eventBus.drain();

    expect(ledger.snapshot('user-1')?.history).toHaveLength(1);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.sourceEvent).toBe('position.closed');
    expect(failures[0]?.message).toBe('notifier down');
  });
});
