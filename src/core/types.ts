export interface WorkUnit {
  readonly id: string;
  readonly kind: string;
  readonly timestamp: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface SubFetchResult {
  source_name: string;
  id: string;
  timestamp: string;
  payload: unknown;
}

export interface UnitSuccess {
  status: 'success';
  unit_id: string;
  merged_results: Record<string, SubFetchResult>;
  processed_at: string;
}

export type FailureKind = 'timeout' | 'processing_error';

export interface UnitFailure {
  status: 'failure';
  kind: FailureKind;
  unit_id: string;
  message: string;
}

export type ProcessedUnit = UnitSuccess | UnitFailure;

export function isSuccess(unit: ProcessedUnit): unit is UnitSuccess {
  return unit.status === 'success';
}

export function isFailure(unit: ProcessedUnit): unit is UnitFailure {
  return unit.status === 'failure';
}

/**
 * Point-in-time snapshot of a worker-pool substrate
 */
export interface ExecutorStats {
  completed_tasks: number;
  queue_length: number;
  pool_size: number;
  active_threads: number;
}

export type SubstratePolicy = 'worker-pool' | 'cheap-task';

/**
 * Anything a virtual user can drive: one call processes one batch of units
 */
export interface BatchProcessor {
  readonly name: string;
  processBatch(units: readonly WorkUnit[]): Promise<ProcessedUnit[]>;
}
