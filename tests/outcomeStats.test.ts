import { mean, median, mode, reachQuantile, winningSamples } from '../src/indicators/outcomeStats.js';

describe('outcome statistics', () => {
  const samples = [10, 20, 30, 40];

  it('computes median and mean', () => {
    expect(median(samples)).toBe(25);
    expect(median([5, 1, 3])).toBe(3);
    expect(mean(samples)).toBe(25);
  });

  it('takes the value reached by the requested share of samples', () => {
    expect(reachQuantile(samples, 0.75)).toBe(20);
    expect(reachQuantile(samples, 0.5)).toBe(30);
    expect(reachQuantile(samples, 1)).toBe(10);
    expect(reachQuantile([12], 0.75)).toBe(12);
  });

  it('buckets the mode to whole percents and breaks ties low', () => {
    expect(mode([10.2, 9.8, 20, 20.4, 30])).toBe(10);
    expect(mode([5, 7, 7, 9])).toBe(7);
    expect(mode([14.6, 15.4, 20])).toBe(15);
  });

  it('keeps only winning samples', () => {
    expect(winningSamples([-5, 0, 12, Number.NaN, 3])).toEqual([12, 3]);
  });

  it('throws on empty input', () => {
    expect(() => median([])).toThrow('Cannot compute median of empty values');
    expect(() => reachQuantile(samples, 0)).toThrow('reach must be in (0, 1], got 0');
  });
});
