import { LatencyStats, MemoryStats, TimingStats } from '../types';
import { roundTo } from '../../utils/time';

/**
 * Linear-interpolated percentile over a sorted copy of `values`:
 * rank `k = (p / 100) * (n - 1)`, blended between its neighbours.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const k = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(k);
  const upper = Math.ceil(k);

  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (k - lower);
}

export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function summarizeTimings(values: readonly number[]): TimingStats {
  return {
    min: values.length > 0 ? Math.min(...values) : 0,
    max: values.length > 0 ? Math.max(...values) : 0,
    avg: average(values),
    p95: percentile(values, 95),
    p99: percentile(values, 99)
  };
}

export function summarizeMemory(values: readonly number[]): MemoryStats {
  return {
    min: values.length > 0 ? Math.min(...values) : 0,
    max: values.length > 0 ? Math.max(...values) : 0,
    avg: average(values)
  };
}

/**
 * Latency block of a load report, rounded to 2 decimals. `undefined` for an empty series.
 */
export function summarizeLatency(values: readonly number[]): LatencyStats | undefined {
  if (values.length === 0) return undefined;

  return {
    min: roundTo(Math.min(...values)),
    max: roundTo(Math.max(...values)),
    avg: roundTo(average(values)),
    p50: roundTo(percentile(values, 50)),
    p90: roundTo(percentile(values, 90)),
    p95: roundTo(percentile(values, 95)),
    p99: roundTo(percentile(values, 99))
  };
}
