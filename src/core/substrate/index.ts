import { TaskSubstrate } from './base';
import { CheapTaskSubstrate } from './cheap-task';
import { WorkerPoolSubstrate } from './worker-pool';
import { SubstrateUnavailableError } from '../errors';
import { SubstratePolicy } from '../types';
import { CheapTaskConfig, WorkerPoolConfig } from '../../config/types';
import { logger } from '../../utils/logger';

export { TaskHandle, BaseSubstrate } from './base';
export type { TaskSubstrate, TaskState, TaskFn } from './base';
export { WorkerPoolSubstrate } from './worker-pool';
export type { WorkerPoolOptions, RejectionPolicy } from './worker-pool';
export { CheapTaskSubstrate, supportsCheapTasks } from './cheap-task';

export interface SubstrateSettings {
  worker_pool: WorkerPoolConfig;
  cheap_task: CheapTaskConfig;
}

export interface CreateSubstrateOptions {
  /** Overrides the cheap-task capability check */
  probe?: () => boolean;
}

/**
 * Pick the scheduling policy once. A cheap-task request on a host that cannot
 * provide it falls back to a fixed-size worker pool.
 */
export function createSubstrate(
  policy: SubstratePolicy,
  settings: SubstrateSettings,
  options: CreateSubstrateOptions = {}
): TaskSubstrate {
  switch (policy) {
    case 'worker-pool':
      return new WorkerPoolSubstrate({
        name: 'worker-pool',
        minWorkers: settings.worker_pool.min_workers,
        maxWorkers: settings.worker_pool.max_workers,
        maxQueue: settings.worker_pool.max_queue,
        idleTimeoutMs: settings.worker_pool.idle_timeout_ms,
        rejectionPolicy: settings.worker_pool.rejection_policy
      });
    case 'cheap-task':
      try {
        return new CheapTaskSubstrate({ name: 'cheap-task', probe: options.probe });
      } catch (error) {
        if (!(error instanceof SubstrateUnavailableError)) {
          throw error;
        }
        logger.event('error', 'substrate_unavailable', {
          policy,
          error: error.message,
          fallback_workers: settings.cheap_task.fallback_workers
        });
        const workers = settings.cheap_task.fallback_workers;
        return new WorkerPoolSubstrate({
          name: 'cheap-task-fallback',
          minWorkers: workers,
          maxWorkers: workers,
          maxQueue: Infinity,
          idleTimeoutMs: 60000,
          rejectionPolicy: 'caller_runs'
        });
      }
  }
}
