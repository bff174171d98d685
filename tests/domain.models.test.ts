import {
  computeRoi,
  hashObject,
  positionKeyId,
  signalSchema,
  sizingSchema,
  userPrefsSchema
} from '../src/domain/models.js';

describe('domain models', () => {
  it('parses a minimal signal and defaults metadata', () => {
    const parsed = signalSchema.parse({ assetId: 'mint-a', signalClass: 'alpha', gradedAt: 1_700_000_000_000 });

    expect(parsed.metadata).toEqual({});
    expect(parsed.price).toBeUndefined();
  });

  it('rejects unknown signal fields and bad classes', () => {
    expect(signalSchema.safeParse({ assetId: 'mint-a', signalClass: 'alpha', gradedAt: 1, extra: true }).success).toBe(
      false
    );
    expect(signalSchema.safeParse({ assetId: 'mint-a', signalClass: 'beta', gradedAt: 1 }).success).toBe(false);
    expect(signalSchema.safeParse({ assetId: 'mint-a', signalClass: 'alpha', gradedAt: 1, price: 0 }).success).toBe(
      false
    );
  });

  it('defaults user preferences', () => {
    const parsed = userPrefsSchema.parse({
      userId: 'user-1',
      tradingEnabled: true,
      sizing: { mode: 'percent', percent: 10 }
    });

    expect(parsed.signalClasses).toEqual(['discovery', 'alpha']);
    expect(parsed.takeProfitMode).toBe('median');
    expect(parsed.takeProfitValue).toBeNull();
    expect(parsed.stopLossPercent).toBeNull();
    expect(parsed.swapOnClassChange).toBe(true);
  });

  it('bounds percent sizing to 100', () => {
    expect(sizingSchema.safeParse({ mode: 'percent', percent: 120 }).success).toBe(false);
    expect(sizingSchema.safeParse({ mode: 'fixed', amountUsd: 25 }).success).toBe(true);
  });

  it('renders position keys and ROI', () => {
    expect(positionKeyId({ assetId: 'mint-a', signalClass: 'discovery' })).toBe('mint-a:discovery');
    expect(computeRoi(1, 0.85)).toBeCloseTo(-0.15, 10);
    expect(computeRoi(2, 3)).toBe(0.5);
  });

  it('hashes objects independent of key order', () => {
    expect(hashObject({ a: 1, b: { c: 2, d: 3 } })).toBe(hashObject({ b: { d: 3, c: 2 }, a: 1 }));
    expect(hashObject({ a: 1, skipped: undefined })).toBe(hashObject({ a: 1 }));
    expect(hashObject({ a: 1 })).not.toBe(hashObject({ a: 2 }));
  });
});
