import { describe, it, expect, vi, afterEach } from 'vitest';
import { WorkerPoolSubstrate, WorkerPoolOptions } from '../../../../src/core/substrate/worker-pool';
import { SubstrateShutdownError, TaskRejectedError, TaskTimeoutError } from '../../../../src/core/errors';
import { deferred, Deferred } from '../../../helpers/deferred';

function createPool(overrides: Partial<WorkerPoolOptions> = {}): WorkerPoolSubstrate {
  return new WorkerPoolSubstrate({
    minWorkers: 0,
    maxWorkers: 1,
    maxQueue: 0,
    idleTimeoutMs: 1000,
    rejectionPolicy: 'caller_runs',
    ...overrides
  });
}

describe('WorkerPoolSubstrate', () => {
  const gates: Deferred<void>[] = [];

  function gate(): Deferred<void> {
    const d = deferred();
    gates.push(d);
    return d;
  }

  afterEach(() => {
    for (const d of gates.splice(0)) d.resolve();
  });

  describe('constructor', () => {
    it('should start min_workers idle workers', () => {
      const pool = createPool({ minWorkers: 2, maxWorkers: 4 });

      expect(pool.name).toBe('worker-pool');
      expect(pool.policy).toBe('worker-pool');
      expect(pool.stats()).toEqual({ completed_tasks: 0, queue_length: 0, pool_size: 2, active_threads: 0 });
    });

    it('should reject invalid worker bounds', () => {
      expect(() => createPool({ minWorkers: 3, maxWorkers: 2 })).toThrow('Invalid worker bounds: min 3, max 2');
      expect(() => createPool({ maxWorkers: 0 })).toThrow('Invalid worker bounds: min 0, max 0');
      expect(() => createPool({ maxQueue: -1 })).toThrow('Invalid queue size: -1');
    });
  });

  describe('submit()', () => {
    it('should spawn workers up to max_workers, then queue', () => {
      const pool = createPool({ maxWorkers: 3, maxQueue: 10 });
      const blocker = gate();

      for (let i = 0; i < 5; i++) {
        pool.submit(() => blocker.promise);
      }

      expect(pool.stats()).toEqual({ completed_tasks: 0, queue_length: 2, pool_size: 3, active_threads: 3 });
      expect(pool.inFlightCount()).toBe(5);
    });

    it('should run queued tasks in submission order', async () => {
      const pool = createPool({ maxWorkers: 1, maxQueue: 5 });
      const blocker = gate();
      const order: number[] = [];

      const first = pool.submit(async () => {
        await blocker.promise;
        order.push(1);
      });
      const queued = [2, 3, 4].map(n => pool.submit(async () => {
        order.push(n);
      }));
      expect(pool.stats().queue_length).toBe(3);

      blocker.resolve();
      await Promise.all([first.result, ...queued.map(handle => handle.result)]);

      expect(order).toEqual([1, 2, 3, 4]);
      expect(pool.stats()).toEqual({ completed_tasks: 4, queue_length: 0, pool_size: 1, active_threads: 0 });
    });

    it('should reject with TaskRejectedError when saturated under abort', () => {
      const pool = createPool({ maxWorkers: 1, maxQueue: 1, rejectionPolicy: 'abort' });
      const blocker = gate();

      pool.submit(() => blocker.promise);
      pool.submit(() => blocker.promise);

      expect(() => pool.submit(() => blocker.promise)).toThrow(TaskRejectedError);
      expect(() => pool.submit(() => blocker.promise)).toThrow("Substrate 'worker-pool' is saturated - task rejected");
      expect(pool.inFlightCount()).toBe(2);
    });

    it('should run the task on the submitter when saturated under caller_runs', async () => {
      const pool = createPool({ maxWorkers: 1, maxQueue: 0 });
      const blocker = gate();
      pool.submit(() => blocker.promise);

      const handle = pool.submit(async () => 'ran anyway');

      await expect(handle.result).resolves.toBe('ran anyway');
      expect(pool.callerRuns()).toBe(1);
      expect(pool.stats()).toEqual({ completed_tasks: 0, queue_length: 0, pool_size: 1, active_threads: 1 });
    });

    it('should run nested submissions on the submitter instead of queueing them', async () => {
      const pool = createPool({ maxWorkers: 1, maxQueue: 4, rejectionPolicy: 'abort' });

      const parent = pool.submit(async () => {
        const child = pool.submit(async () => 'child');
        return `parent of ${await child.result}`;
      });

      await expect(pool.awaitTask(parent, 1000)).resolves.toBe('parent of child');
      expect(pool.callerRuns()).toBe(1);
      expect(pool.stats()).toEqual({ completed_tasks: 1, queue_length: 0, pool_size: 1, active_threads: 0 });
    });

    it('should turn a synchronous throw into a rejected task', async () => {
      const pool = createPool();

      const handle = pool.submit((): Promise<number> => {
        throw new Error('sync failure');
      });

      await expect(handle.result).rejects.toThrow('sync failure');
      expect(handle.state).toBe('rejected');
      expect(pool.stats().active_threads).toBe(0);
    });
  });

  describe('awaitTask()', () => {
    it('should time out the waiter without cancelling the task', async () => {
      const pool = createPool();
      const blocker = gate();
      const handle = pool.submit(async () => {
        await blocker.promise;
        return 'late';
      });

      const error = await pool.awaitTask(handle, 20).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(TaskTimeoutError);
      expect(error).toHaveProperty('message', `Task ${handle.id} did not complete within 20ms`);
      expect(handle.state).toBe('pending');

      blocker.resolve();
      await handle.settled;
      expect(handle.state).toBe('fulfilled');
      await expect(handle.result).resolves.toBe('late');
    });

    it('should observe a rejection that lands after the waiter gave up', async () => {
      const pool = createPool();
      const failure = deferred<string>();
      const handle = pool.submit(() => failure.promise);

      await expect(pool.awaitTask(handle, 10)).rejects.toThrow(TaskTimeoutError);

      failure.reject(new Error('upstream gone'));
      await handle.settled;

      expect(handle.state).toBe('rejected');
      expect(handle.error).toBeInstanceOf(Error);
      expect(handle.error).toHaveProperty('message', 'upstream gone');
      expect(pool.inFlightCount()).toBe(0);
    });

    it('should return the result when the task finishes in time', async () => {
      const pool = createPool();
      const handle = pool.submit(async () => 42);

      await expect(pool.awaitTask(handle, 1000)).resolves.toBe(42);
    });
  });

  describe('idle reclamation', () => {
    it('should shrink back to min_workers after the idle timeout', async () => {
      const pool = createPool({ minWorkers: 1, maxWorkers: 3, idleTimeoutMs: 20 });
      const blocker = gate();

      const handles = [1, 2, 3].map(() => pool.submit(() => blocker.promise));
      expect(pool.stats().pool_size).toBe(3);

      blocker.resolve();
      await Promise.all(handles.map(handle => handle.result));

      await vi.waitFor(() => expect(pool.stats().pool_size).toBe(1));
      expect(pool.stats().completed_tasks).toBe(3);
    });
  });

  describe('shutdown()', () => {
    it('should drain in-flight tasks and refuse new ones', async () => {
      const pool = createPool({ maxWorkers: 2 });
      const blocker = gate();
      const handle = pool.submit(() => blocker.promise);

      const drained = pool.shutdown(1000);
      expect(() => pool.submit(async () => 'too late')).toThrow(SubstrateShutdownError);
      blocker.resolve();

      await expect(drained).resolves.toBe(true);
      expect(handle.state).toBe('fulfilled');
      expect(pool.isShutdown).toBe(true);
    });

    it('should report false when the drain budget runs out', async () => {
      const pool = createPool();
      const blocker = gate();
      pool.submit(() => blocker.promise);

      await expect(pool.shutdown(20)).resolves.toBe(false);
      expect(pool.inFlightCount()).toBe(1);
    });
  });
});
