import { describe, it, expect, beforeEach } from 'vitest';
import { DAY_MS, IndicatorHistory, lastDays } from '../indicator-history';
import { createSample, type IndicatorId } from '../../../domain/entities/indicator-sample.entity';
import { normalizedRange } from '../series.math';

const T0 = Date.parse('2024-01-01T00:00:00Z');

function at(day: number): Date {
  return new Date(T0 + day * DAY_MS);
}

function fill(history: IndicatorHistory, id: IndicatorId, values: number[]): void {
  values.forEach((value, day) => history.append(id, createSample(id, value, at(day))));
}

describe('IndicatorHistory', () => {
  let history: IndicatorHistory;

  beforeEach(() => {
    history = new IndicatorHistory();
  });

  it('starts clean and becomes dirty on append', () => {
    expect(history.isDirty()).toBe(false);
    history.append('fear_greed', createSample('fear_greed', 50, at(0)));
    expect(history.isDirty()).toBe(true);
    history.markClean();
    expect(history.isDirty()).toBe(false);
  });

  it('rejects samples older than the last one', () => {
    history.append('fear_greed', createSample('fear_greed', 50, at(2)));

    expect(() => history.append('fear_greed', createSample('fear_greed', 40, at(1)))).toThrow(RangeError);
    expect(history.size('fear_greed')).toBe(1);
  });

  it('accepts equal timestamps', () => {
    history.append('fear_greed', createSample('fear_greed', 50, at(1)));
    history.append('fear_greed', createSample('fear_greed', 51, at(1)));

    expect(history.size('fear_greed')).toBe(2);
  });

  it('rejects a sample filed under another indicator', () => {
    expect(() => history.append('btc_dominance', createSample('eth_dominance', 15, at(0)))).toThrow(RangeError);
  });

  describe('recent', () => {
    beforeEach(() => fill(history, 'altcoin_market_cap', [10, 20, 30, 40, 50]));

    it('takes the last n samples for a count window', () => {
      const values = [...history.recent('altcoin_market_cap', { count: 2 })].map((s) => s.value);
      expect(values).toEqual([40, 50]);
    });

    it('returns everything when the count exceeds the series', () => {
      expect([...history.recent('altcoin_market_cap', { count: 10 })]).toHaveLength(5);
    });

    it('includes both ends of a span window', () => {
      const values = [...history.recent('altcoin_market_cap', { spanMs: 2 * DAY_MS })].map((s) => s.value);
      expect(values).toEqual([30, 40, 50]);
    });

    it('anchors a span window at until', () => {
      const values = [...history.recent('altcoin_market_cap', lastDays(1, at(2)))].map((s) => s.value);
      expect(values).toEqual([20, 30]);
    });

    it('can be iterated again and sees later appends', () => {
      const view = history.recent('altcoin_market_cap', { count: 1 });
      expect([...view].map((s) => s.value)).toEqual([50]);

      history.append('altcoin_market_cap', createSample('altcoin_market_cap', 60, at(5)));
      expect([...view].map((s) => s.value)).toEqual([60]);
    });

    it('is empty for an unknown series', () => {
      expect([...history.recent('m2_supply', { count: 3 })]).toEqual([]);
    });
  });

  describe('peak', () => {
    it('returns the maximum in the window', () => {
      fill(history, 'altcoin_market_cap', [100, 90, 85]);

      expect(history.peak('altcoin_market_cap', lastDays(30))).toBe(100);
      expect(history.peak('altcoin_market_cap', { count: 2 })).toBe(90);
    });

    it('returns null for an empty window', () => {
      expect(history.peak('altcoin_market_cap', lastDays(30))).toBeNull();
    });

    it('ignores samples older than the span', () => {
      fill(history, 'altcoin_market_cap', [100, 60, 70]);

      expect(history.peak('altcoin_market_cap', lastDays(1))).toBe(70);
    });
  });

  describe('flattenMetric', () => {
    it('is the range relative to the mean', () => {
      fill(history, 'm2_supply', [100, 101, 102]);

      // (102 - 100) / 101
      expect(history.flattenMetric('m2_supply', { count: 3 })).toBeCloseTo(2 / 101, 12);
    });

    it('is zero for a constant series', () => {
      fill(history, 'm2_supply', [20000, 20000, 20000]);

      expect(history.flattenMetric('m2_supply', { count: 3 })).toBe(0);
    });

    it('is null with fewer than two samples', () => {
      fill(history, 'm2_supply', [20000]);

      expect(history.flattenMetric('m2_supply', { count: 3 })).toBeNull();
    });
  });

  it('lists only indicators with samples', () => {
    fill(history, 'btc_dominance', [50]);
    fill(history, 'fear_greed', [40, 45]);

    expect(history.indicatorIds().sort()).toEqual(['btc_dominance', 'fear_greed']);
    expect(history.latest('fear_greed')?.value).toBe(45);
    expect(history.latest('m2_supply')).toBeNull();
  });
});

describe('normalizedRange', () => {
  it('is null for a zero mean', () => {
    expect(normalizedRange([-1, 1])).toBeNull();
  });
});
