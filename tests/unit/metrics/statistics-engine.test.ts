import { describe, it, expect } from 'vitest';
import { average, percentile, summarizeLatency, summarizeTimings } from '../../../src/metrics/core/statistics-engine';

describe('percentile', () => {
  it('should interpolate between neighbours', () => {
    expect(percentile([10, 20, 30, 40, 50], 50)).toBe(30);
    expect(percentile([10, 20, 30, 40], 50)).toBe(25);
  });

  it('should sort a copy of the input', () => {
    const values = [50, 10, 40, 20, 30];

    expect(percentile(values, 0)).toBe(10);
    expect(percentile(values, 100)).toBe(50);
    expect(values).toEqual([50, 10, 40, 20, 30]);
  });

  it('should return 0 for an empty series and the value for a single sample', () => {
    expect(percentile([], 95)).toBe(0);
    expect(percentile([5], 99)).toBe(5);
  });
});

describe('average', () => {
  it('should return 0 for an empty series', () => {
    expect(average([])).toBe(0);
    expect(average([1, 2, 3, 6])).toBe(3);
  });
});

describe('summarizeTimings', () => {
  it('should zero an empty series', () => {
    expect(summarizeTimings([])).toEqual({ min: 0, max: 0, avg: 0, p95: 0, p99: 0 });
  });
});

describe('summarizeLatency', () => {
  it('should round to two decimals', () => {
    expect(summarizeLatency([1.234, 2.346])).toEqual({
      min: 1.23,
      max: 2.35,
      avg: 1.79,
      p50: 1.79,
      p90: 2.23,
      p95: 2.29,
      p99: 2.33
    });
  });

  it('should be undefined for an empty series', () => {
    expect(summarizeLatency([])).toBeUndefined();
  });
});
