import { EventEmitter } from 'events';
import { TaskSubstrate } from './substrate';
import { TaskTimeoutError } from './errors';
import { ProcessedUnit, SubFetchResult, UnitFailure, WorkUnit } from './types';
import { ApiClientPool } from '../clients/api-client-pool';
import { MetricsCollector } from '../metrics/collector';
import { EventFields, EventLevel, errorMessage, logger } from '../utils/logger';
import { TimestampHelper } from '../utils/timestamp-helper';
import { elapsedMs, roundTo } from '../utils/time';

export type ApiCallEvent = {
  api: string;
  duration_ms: number;
};

export type ApiErrorEvent = {
  api: string;
  error: string;
};

export type UnitErrorEvent = {
  unit_id: string;
  error: string;
};

export interface UnitProcessorOptions {
  /** Prefix of the `<implementation>/<source>` metric keys */
  implementation: string;
  substrate: TaskSubstrate;
  sources: readonly [ApiClientPool, ApiClientPool];
  unitTimeoutMs: number;
  metrics?: MetricsCollector;
}

/**
 * Fans one unit out to both sources and merges the answers.
 *
 * Emits `api_call`, `api_error`, `timeout_error` and `processing_error`
 * with the same fields it logs.
 */
export class UnitProcessor extends EventEmitter {
  private readonly implementation: string;
  private readonly substrate: TaskSubstrate;
  private readonly sources: readonly [ApiClientPool, ApiClientPool];
  private readonly unitTimeoutMs: number;
  private readonly metrics?: MetricsCollector;

  constructor(options: UnitProcessorOptions) {
    super();
    this.implementation = options.implementation;
    this.substrate = options.substrate;
    this.sources = options.sources;
    this.unitTimeoutMs = options.unitTimeoutMs;
    this.metrics = options.metrics;
  }

  /**
   * Never rejects: every outcome is a ProcessedUnit.
   */
  async process(unit: WorkUnit): Promise<ProcessedUnit> {
    try {
      const handles = this.sources.map(source => this.substrate.submit(() => this.fetch(source)));

      const merged: Record<string, SubFetchResult> = {};
      for (let i = 0; i < handles.length; i++) {
        merged[this.sources[i].name] = await this.substrate.awaitTask(handles[i], this.unitTimeoutMs);
      }

      return {
        status: 'success',
        unit_id: unit.id,
        merged_results: merged,
        processed_at: TimestampHelper.now()
      };
    } catch (error) {
      if (error instanceof TaskTimeoutError) {
        return this.fail(unit, 'timeout', 'timeout_error', error);
      }
      return this.fail(unit, 'processing_error', 'processing_error', error);
    }
  }

  private async fetch(source: ApiClientPool): Promise<SubFetchResult> {
    const key = `${this.implementation}/${source.name}`;
    const startMark = performance.now();

    try {
      return await source.withClient(client => client.fetch());
    } catch (error) {
      const fields: ApiErrorEvent = { api: source.name, error: errorMessage(error) };
      this.metrics?.recordError(key, error);
      this.publish('error', 'api_error', fields);
      throw error;
    } finally {
      const fields: ApiCallEvent = { api: source.name, duration_ms: roundTo(elapsedMs(startMark)) };
      this.metrics?.recordTiming(key, fields.duration_ms);
      this.publish('debug', 'api_call', fields);
    }
  }

  private fail(unit: WorkUnit, kind: UnitFailure['kind'], event: string, error: unknown): UnitFailure {
    const fields: UnitErrorEvent = { unit_id: unit.id, error: errorMessage(error) };
    this.publish('error', event, fields);

    return {
      status: 'failure',
      kind,
      unit_id: unit.id,
      message: fields.error
    };
  }

  private publish(level: EventLevel, event: string, fields: EventFields): void {
    logger.event(level, event, fields);
    this.emit(event, fields);
  }
}
