import { EventEmitter } from 'events';
import { TaskSubstrate } from './substrate';
import { UnitProcessor } from './unit-processor';
import { BatchFailureError } from './errors';
import { ExecutorStats, ProcessedUnit, WorkUnit } from './types';
import { errorMessage, logger } from '../utils/logger';
import { elapsedMs, roundTo } from '../utils/time';

export type PerformanceMetricsEvent = {
  total_units: number;
  total_duration_ms: number;
  avg_duration_ms: number;
  executor_stats?: ExecutorStats;
};

export type BatchFailureEvent = {
  total_units: number;
  completed_units: number;
  error: string;
};

export interface BatchDriverOptions {
  substrate: TaskSubstrate;
  processor: UnitProcessor;
  batchTimeoutMs: number;
  /** Throw BatchFailureError instead of returning an empty batch */
  strict?: boolean;
}

/**
 * Runs a whole batch of units through the substrate, one task per unit.
 */
export class BatchDriver extends EventEmitter {
  private readonly substrate: TaskSubstrate;
  private readonly processor: UnitProcessor;
  private readonly batchTimeoutMs: number;
  private readonly strict: boolean;

  constructor(options: BatchDriverOptions) {
    super();
    this.substrate = options.substrate;
    this.processor = options.processor;
    this.batchTimeoutMs = options.batchTimeoutMs;
    this.strict = options.strict ?? false;
  }

  /**
   * Results come back in input order. A batch-level failure yields `[]`
   * (or BatchFailureError in strict mode), so an empty result alone does not
   * distinguish "no units" from "failed batch"; the `batch_failure` event does.
   */
  async processBatch(units: readonly WorkUnit[]): Promise<ProcessedUnit[]> {
    if (units.length === 0) {
      return [];
    }

    const startMark = performance.now();
    const results: ProcessedUnit[] = [];

    try {
      const handles = units.map(unit => this.substrate.submit(() => this.processor.process(unit)));
      for (const handle of handles) {
        results.push(await this.substrate.awaitTask(handle, this.batchTimeoutMs));
      }
    } catch (error) {
      const fields: BatchFailureEvent = {
        total_units: units.length,
        completed_units: results.length,
        error: errorMessage(error)
      };
      logger.error(`❌ Error processing batch: ${fields.error}`);
      logger.event('error', 'batch_failure', fields);
      this.emit('batch_failure', fields);

      if (this.strict) {
        throw new BatchFailureError(results, units.length, error);
      }
      return [];
    }

    this.reportPerformance(units.length, elapsedMs(startMark));
    return results;
  }

  private reportPerformance(totalUnits: number, durationMs: number): void {
    const fields: PerformanceMetricsEvent = {
      total_units: totalUnits,
      total_duration_ms: roundTo(durationMs),
      avg_duration_ms: roundTo(durationMs / totalUnits)
    };

    const stats = this.substrate.stats();
    if (stats) {
      fields.executor_stats = stats;
    }

    logger.event('info', 'performance_metrics', fields);
    this.emit('performance_metrics', fields);
  }
}
