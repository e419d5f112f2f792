import { describe, it, expect } from 'vitest';
import { createSubstrate, CheapTaskSubstrate, WorkerPoolSubstrate } from '../../../../src/core/substrate';
import { testConfig } from '../../../helpers/fakes';

describe('createSubstrate', () => {
  it('should build a worker pool from the worker_pool settings', () => {
    const substrate = createSubstrate('worker-pool', testConfig());

    expect(substrate).toBeInstanceOf(WorkerPoolSubstrate);
    expect(substrate.name).toBe('worker-pool');
    expect(substrate.stats()).toEqual({ completed_tasks: 0, queue_length: 0, pool_size: 2, active_threads: 0 });
  });

  it('should build a cheap-task substrate when the host supports it', () => {
    const substrate = createSubstrate('cheap-task', testConfig());

    expect(substrate).toBeInstanceOf(CheapTaskSubstrate);
    expect(substrate.name).toBe('cheap-task');
    expect(substrate.stats()).toBeUndefined();
  });

  it('should fall back to a fixed-size worker pool when cheap tasks are unavailable', async () => {
    const substrate = createSubstrate('cheap-task', testConfig(), { probe: () => false });

    expect(substrate).toBeInstanceOf(WorkerPoolSubstrate);
    expect(substrate.name).toBe('cheap-task-fallback');
    expect(substrate.policy).toBe('worker-pool');
    expect(substrate.stats()).toEqual({ completed_tasks: 0, queue_length: 0, pool_size: 4, active_threads: 0 });

    const handle = substrate.submit(async () => 'done');
    await expect(substrate.awaitTask(handle, 1000)).resolves.toBe('done');
    await substrate.shutdown(1000);
  });
});
