import { ErrorRate, ErrorSample, MetricsStatistics, MemoryStats, TimingStats } from './types';
import { ErrorTracker } from './core/error-tracker';
import { summarizeMemory, summarizeTimings, sum } from './core/statistics-engine';

/**
 * Timing, memory and error samples for one benchmark or load run.
 * Owned by whoever drives the run and handed to the components that record into it.
 */
export class MetricsCollector {
  private timings: Map<string, number[]> = new Map();
  private memory: Map<string, number[]> = new Map();
  private errors: ErrorTracker = new ErrorTracker();

  recordTiming(operation: string, durationMs: number): void {
    append(this.timings, operation, durationMs);
  }

  /**
   * Record a memory sample in bytes. Without `bytes` the current resident set size is sampled.
   */
  recordMemory(implementation: string, bytes?: number): void {
    append(this.memory, implementation, bytes ?? process.memoryUsage().rss);
  }

  recordError(implementation: string, error: unknown): ErrorSample {
    return this.errors.trackError(implementation, error);
  }

  timingSamples(operation: string): number[] {
    return [...(this.timings.get(operation) ?? [])];
  }

  memorySamples(implementation: string): number[] {
    return [...(this.memory.get(implementation) ?? [])];
  }

  errorSamples(implementation: string): ErrorSample[] {
    return this.errors.getErrors(implementation);
  }

  /**
   * Number of timing samples, across every operation
   */
  sampleCount(): number {
    let count = 0;
    for (const samples of this.timings.values()) count += samples.length;
    return count;
  }

  statistics(): MetricsStatistics {
    const timings: Record<string, TimingStats> = {};
    for (const [operation, samples] of this.timings) {
      timings[operation] = summarizeTimings(samples);
    }

    const memory: Record<string, MemoryStats> = {};
    for (const [implementation, samples] of this.memory) {
      memory[implementation] = summarizeMemory(samples);
    }

    const errorRates: Record<string, ErrorRate> = {};
    for (const key of this.errors.keys()) {
      const count = this.errors.count(key);
      errorRates[key] = { count, rate: count / this.errorRateDenominator(key) };
    }

    let totalDuration = 0;
    for (const samples of this.timings.values()) totalDuration += sum(samples);

    return {
      timings,
      memory,
      error_rates: errorRates,
      summary: {
        total_operations: this.sampleCount(),
        total_errors: this.errors.totalCount(),
        total_duration: totalDuration
      }
    };
  }

  reset(): void {
    this.timings.clear();
    this.memory.clear();
    this.errors.clear();
  }

  // Same-key timing series, else the first series recorded, else 1
  private errorRateDenominator(key: string): number {
    const own = this.timings.get(key);
    if (own && own.length > 0) return own.length;

    for (const samples of this.timings.values()) {
      if (samples.length > 0) return samples.length;
    }
    return 1;
  }
}

function append(series: Map<string, number[]>, key: string, value: number): void {
  const samples = series.get(key);
  if (samples) {
    samples.push(value);
  } else {
    series.set(key, [value]);
  }
}
