import type { ProcessedUnit } from './types';

export type FanoutErrorCode =
  | 'POOL_TIMEOUT'
  | 'RESOURCE_POOL'
  | 'TASK_TIMEOUT'
  | 'TASK_REJECTED'
  | 'SUBSTRATE_SHUTDOWN'
  | 'SUBSTRATE_UNAVAILABLE'
  | 'BATCH_FAILURE'
  | 'CONFIGURATION';

export class FanoutError extends Error {
  constructor(
    public readonly code: FanoutErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FanoutError';
  }
}

/**
 * A resource pool could not hand out a resource within its wait budget
 */
export class PoolTimeoutError extends FanoutError {
  constructor(
    public readonly poolName: string,
    public readonly timeoutMs: number
  ) {
    super('POOL_TIMEOUT', `Pool '${poolName}' exhausted: no resource available within ${timeoutMs}ms`);
    this.name = 'PoolTimeoutError';
  }
}

export class ResourcePoolError extends FanoutError {
  constructor(public readonly poolName: string, message: string) {
    super('RESOURCE_POOL', `Pool '${poolName}': ${message}`);
    this.name = 'ResourcePoolError';
  }
}

export class TaskTimeoutError extends FanoutError {
  constructor(
    public readonly taskId: number,
    public readonly timeoutMs: number
  ) {
    super('TASK_TIMEOUT', `Task ${taskId} did not complete within ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

export class TaskRejectedError extends FanoutError {
  constructor(public readonly substrateName: string) {
    super('TASK_REJECTED', `Substrate '${substrateName}' is saturated - task rejected`);
    this.name = 'TaskRejectedError';
  }
}

export class SubstrateShutdownError extends FanoutError {
  constructor(public readonly substrateName: string) {
    super('SUBSTRATE_SHUTDOWN', `Substrate '${substrateName}' is shut down - task rejected`);
    this.name = 'SubstrateShutdownError';
  }
}

export class SubstrateUnavailableError extends FanoutError {
  constructor(public readonly substrateName: string, reason: string) {
    super('SUBSTRATE_UNAVAILABLE', `Substrate '${substrateName}' is unavailable: ${reason}`);
    this.name = 'SubstrateUnavailableError';
  }
}

/**
 * Raised by a strict BatchDriver. Carries the unit results gathered before the failure.
 */
export class BatchFailureError extends FanoutError {
  constructor(
    public readonly partialResults: ProcessedUnit[],
    public readonly totalUnits: number,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BATCH_FAILURE', `Batch failed after ${partialResults.length}/${totalUnits} units: ${reason}`, { cause });
    this.name = 'BatchFailureError';
  }
}

export class ConfigurationError extends FanoutError {
  constructor(message: string, public readonly details: string[] = []) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
  }
}
