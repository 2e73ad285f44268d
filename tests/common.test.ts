import { describe, expect, it } from 'vitest';

import { BoundedHistory, formatNumber, percent, summarise } from '../src/training/common';

describe('summarise', () => {
  it('uses the population standard deviation', () => {
    expect(summarise([2, 4, 4, 4, 5, 5, 7, 9])).toEqual({ mean: 5, std: 2, min: 2, max: 9 });
  });

  it('is all zeros for no values and has zero spread for one', () => {
    expect(summarise([])).toEqual({ mean: 0, std: 0, min: 0, max: 0 });
    expect(summarise([3])).toEqual({ mean: 3, std: 0, min: 3, max: 3 });
  });
});

describe('helpers', () => {
  it('expresses rates as percentages', () => {
    expect(percent(1, 4)).toBe(25);
    expect(percent(1, 0)).toBe(0);
  });

  it('prints non-finite numbers as zero', () => {
    expect(formatNumber(1 / 3)).toBe('0.33');
    expect(formatNumber(Number.NaN, 1)).toBe('0.0');
  });
});

describe('BoundedHistory', () => {
  it('drops the oldest values past its capacity', () => {
    const history = new BoundedHistory(3);
    [1, 2, 3, 4, 5].forEach((value) => history.push(value));
    expect(history.toArray()).toEqual([3, 4, 5]);
    expect(history.length).toBe(3);
    expect(history.rollingMean(2)).toBe(4.5);
  });
});
