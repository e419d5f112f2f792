import { PerformanceObserver } from 'perf_hooks';
import { BatchProcessor, WorkUnit } from './types';
import { generateUnits } from './unit-generator';
import { BenchmarkConfig } from '../config/types';
import { MetricsCollector } from '../metrics/collector';
import { average, sum } from '../metrics/core/statistics-engine';
import { errorMessage, logger } from '../utils/logger';
import { elapsedMs, roundTo } from '../utils/time';

export interface IterationStats {
  /** `-1` when the iteration failed */
  duration_ms: number;
  memory_bytes: number;
  gc_count: number;
}

export interface WarmUpResult {
  ok: boolean;
  error?: string;
}

export interface ImplementationBenchmark {
  warmup: WarmUpResult;
  durations: number[];
  memory: number[];
  gc_counts: number[];
}

export interface DurationSummary {
  average: number;
  min: number;
  max: number;
  average_memory_mb: number;
  gc_runs: number;
}

export interface BenchmarkComparison {
  baseline: string;
  candidate: string;
  /** Positive when the candidate is faster */
  speed_improvement: number;
  memory_difference_mb: number;
  gc_difference: number;
}

export interface BenchmarkReport {
  units: number;
  iterations: number;
  results: Record<string, ImplementationBenchmark>;
  comparison: BenchmarkComparison | null;
}

export interface BenchmarkRunnerOptions {
  /** The first two are compared: baseline, then candidate */
  implementations: readonly BatchProcessor[];
  config: BenchmarkConfig;
  metrics?: MetricsCollector;
  onIteration?: (implementation: string, iteration: number, stats: IterationStats) => void;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Counts garbage-collection entries between `start()` and `stop()`.
 */
export class GcCounter {
  private count: number = 0;
  private observer?: PerformanceObserver;

  start(): void {
    this.count = 0;
    this.observer = new PerformanceObserver(list => {
      this.count += list.getEntries().length;
    });
    this.observer.observe({ entryTypes: ['gc'] });
  }

  stop(): number {
    if (this.observer) {
      this.count += this.observer.takeRecords().length;
      this.observer.disconnect();
      this.observer = undefined;
    }
    return this.count;
  }
}

/**
 * Single-shot comparative benchmark: one warm-up batch per implementation,
 * then timed iterations over the full unit set.
 */
export class BenchmarkRunner {
  private readonly options: BenchmarkRunnerOptions;
  private readonly units: WorkUnit[];

  constructor(options: BenchmarkRunnerOptions) {
    this.options = options;
    this.units = generateUnits(options.config.units);
  }

  get unitCount(): number {
    return this.units.length;
  }

  async run(): Promise<BenchmarkReport> {
    const { config } = this.options;
    const results: Record<string, ImplementationBenchmark> = {};

    for (const implementation of this.options.implementations) {
      const warmup = await this.warmUp(implementation);
      logger.info(`🔥 Warm-up ${implementation.name}: ${warmup.ok ? 'done' : `failed (${warmup.error})`}`);
      results[implementation.name] = { warmup, durations: [], memory: [], gc_counts: [] };
    }

    for (const implementation of this.options.implementations) {
      logger.info(`⏱️ Running benchmark for ${implementation.name}...`);
      const entry = results[implementation.name];

      for (let i = 0; i < config.iterations; i++) {
        const stats = await this.runIteration(implementation);
        entry.durations.push(stats.duration_ms);
        entry.memory.push(stats.memory_bytes);
        entry.gc_counts.push(stats.gc_count);
        this.options.onIteration?.(implementation.name, i + 1, stats);
      }
    }

    const [baseline, candidate] = this.options.implementations;
    return {
      units: this.units.length,
      iterations: config.iterations,
      results,
      comparison: baseline && candidate
        ? compareBenchmarks(baseline.name, results[baseline.name], candidate.name, results[candidate.name])
        : null
    };
  }

  async warmUp(implementation: BatchProcessor): Promise<WarmUpResult> {
    const sample = this.units.slice(0, this.options.config.warmup_units);
    const timeoutMs = this.options.config.warmup_timeout_ms;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new Error(`warm-up exceeded ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      await Promise.race([implementation.processBatch(sample), timeout]);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async runIteration(implementation: BatchProcessor): Promise<IterationStats> {
    const gc = new GcCounter();
    gc.start();
    const heapBefore = process.memoryUsage().heapUsed;
    const startMark = performance.now();

    try {
      await implementation.processBatch(this.units);
      const duration = elapsedMs(startMark);
      const memory = process.memoryUsage().heapUsed - heapBefore;

      this.options.metrics?.recordTiming(implementation.name, duration);
      this.options.metrics?.recordMemory(implementation.name, memory);
      return { duration_ms: duration, memory_bytes: memory, gc_count: gc.stop() };
    } catch (error) {
      gc.stop();
      logger.error(`❌ Benchmark iteration of ${implementation.name} failed: ${errorMessage(error)}`);
      this.options.metrics?.recordError(implementation.name, error);
      return { duration_ms: -1, memory_bytes: 0, gc_count: 0 };
    }
  }
}

/**
 * Per-implementation figures over the successful iterations. `null` when every iteration failed.
 */
export function summarizeBenchmark(result: ImplementationBenchmark): DurationSummary | null {
  const durations = result.durations.filter(duration => duration >= 0);
  if (durations.length === 0) return null;

  return {
    average: roundTo(average(durations)),
    min: roundTo(Math.min(...durations)),
    max: roundTo(Math.max(...durations)),
    average_memory_mb: roundTo(average(result.memory) / BYTES_PER_MB),
    gc_runs: sum(result.gc_counts)
  };
}

export function compareBenchmarks(
  baselineName: string,
  baseline: ImplementationBenchmark,
  candidateName: string,
  candidate: ImplementationBenchmark
): BenchmarkComparison | null {
  const baselineAvg = average(baseline.durations.filter(duration => duration >= 0));
  const candidateAvg = average(candidate.durations.filter(duration => duration >= 0));
  if (baselineAvg === 0 || candidateAvg === 0) return null;

  return {
    baseline: baselineName,
    candidate: candidateName,
    speed_improvement: roundTo(((baselineAvg - candidateAvg) / baselineAvg) * 100),
    memory_difference_mb: roundTo((average(baseline.memory) - average(candidate.memory)) / BYTES_PER_MB),
    gc_difference: sum(baseline.gc_counts) - sum(candidate.gc_counts)
  };
}
