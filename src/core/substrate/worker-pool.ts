import { AsyncLocalStorage } from 'async_hooks';
import { BaseSubstrate, TaskFn } from './base';
import { TaskRejectedError } from '../errors';
import { ExecutorStats } from '../types';
import { logger } from '../../utils/logger';

export type RejectionPolicy = 'caller_runs' | 'abort';

export interface WorkerPoolOptions {
  name?: string;
  minWorkers: number;
  maxWorkers: number;
  /** Backlog size once every worker is busy; `Infinity` for unbounded */
  maxQueue: number;
  idleTimeoutMs: number;
  rejectionPolicy: RejectionPolicy;
}

interface WorkerSlot {
  id: number;
  busy: boolean;
  idleTimer?: NodeJS.Timeout;
}

interface QueuedTask {
  start: (slot: WorkerSlot) => void;
  queuedAt: number;
}

/**
 * Bounded worker pool: at most `maxWorkers` tasks hold a worker slot, up to
 * `maxQueue` more wait in FIFO order, and anything beyond that is either run
 * by the submitter or rejected.
 *
 * A task submitted from inside a task that holds one of this pool's workers
 * never waits in the queue: once no worker is free it runs on the submitter,
 * whatever the rejection policy, so a parent cannot wait on a child queued behind it.
 */
export class WorkerPoolSubstrate extends BaseSubstrate {
  readonly policy = 'worker-pool' as const;
  private readonly options: WorkerPoolOptions;
  private workers: Map<number, WorkerSlot> = new Map();
  private queue: QueuedTask[] = [];
  private nextWorkerId: number = 1;
  private completedTasks: number = 0;
  private callerRunsCount: number = 0;
  private readonly workerContext = new AsyncLocalStorage<number>();

  constructor(options: WorkerPoolOptions) {
    super(options.name ?? 'worker-pool');

    if (options.minWorkers < 0 || options.maxWorkers < 1 || options.minWorkers > options.maxWorkers) {
      throw new Error(`Invalid worker bounds: min ${options.minWorkers}, max ${options.maxWorkers}`);
    }
    if (options.maxQueue < 0) {
      throw new Error(`Invalid queue size: ${options.maxQueue}`);
    }
    this.options = options;

    for (let i = 0; i < options.minWorkers; i++) {
      this.spawnWorker();
    }
    logger.debug(`🏊 Worker pool '${this.name}' ready (min: ${options.minWorkers}, max: ${options.maxWorkers}, queue: ${options.maxQueue}, policy: ${options.rejectionPolicy})`);
  }

  stats(): ExecutorStats {
    let active = 0;
    for (const slot of this.workers.values()) {
      if (slot.busy) active++;
    }

    return {
      completed_tasks: this.completedTasks,
      queue_length: this.queue.length,
      pool_size: this.workers.size,
      active_threads: active
    };
  }

  /**
   * Number of submissions that ran on the submitter because the pool was saturated
   */
  callerRuns(): number {
    return this.callerRunsCount;
  }

  protected schedule<T>(fn: TaskFn<T>): Promise<T> {
    const idle = this.findIdleWorker();
    if (idle) {
      return this.runOn(idle, fn);
    }

    if (this.workers.size < this.options.maxWorkers) {
      return this.runOn(this.spawnWorker(), fn);
    }

    if (this.workerContext.getStore() !== undefined) {
      this.callerRunsCount++;
      return runTask(fn);
    }

    if (this.queue.length < this.options.maxQueue) {
      return new Promise<T>((resolve, reject) => {
        this.queue.push({
          start: slot => {
            this.runOn(slot, fn).then(resolve, reject);
          },
          queuedAt: Date.now()
        });
      });
    }

    if (this.options.rejectionPolicy === 'abort') {
      throw new TaskRejectedError(this.name);
    }

    // Saturated: the submitter runs the work itself, outside any worker slot
    this.callerRunsCount++;
    return runTask(fn);
  }

  protected onShutdown(): void {
    for (const slot of this.workers.values()) {
      if (slot.idleTimer) {
        clearTimeout(slot.idleTimer);
        slot.idleTimer = undefined;
      }
    }
  }

  private async runOn<T>(slot: WorkerSlot, fn: TaskFn<T>): Promise<T> {
    slot.busy = true;
    if (slot.idleTimer) {
      clearTimeout(slot.idleTimer);
      slot.idleTimer = undefined;
    }

    try {
      return await this.workerContext.run(slot.id, () => runTask(fn));
    } finally {
      this.completedTasks++;
      slot.busy = false;
      this.onWorkerFree(slot);
    }
  }

  private onWorkerFree(slot: WorkerSlot): void {
    const next = this.queue.shift();
    if (next) {
      logger.debug(`Worker ${slot.id} picked up a task queued for ${Date.now() - next.queuedAt}ms`);
      next.start(slot);
      return;
    }

    if (this.workers.size > this.options.minWorkers && !this.isShutdown) {
      slot.idleTimer = setTimeout(() => this.reclaim(slot), this.options.idleTimeoutMs);
      slot.idleTimer.unref();
    }
  }

  private reclaim(slot: WorkerSlot): void {
    slot.idleTimer = undefined;
    if (slot.busy || this.workers.size <= this.options.minWorkers) {
      return;
    }
    this.workers.delete(slot.id);
    logger.debug(`🧹 Reclaimed idle worker ${slot.id} from '${this.name}'`);
  }

  private findIdleWorker(): WorkerSlot | undefined {
    for (const slot of this.workers.values()) {
      if (!slot.busy) return slot;
    }
    return undefined;
  }

  private spawnWorker(): WorkerSlot {
    const slot: WorkerSlot = { id: this.nextWorkerId++, busy: false };
    this.workers.set(slot.id, slot);
    return slot;
  }
}

// Synchronous throws from `fn` become rejections
function runTask<T>(fn: TaskFn<T>): Promise<T> {
  return new Promise<T>(resolve => resolve(fn()));
}
