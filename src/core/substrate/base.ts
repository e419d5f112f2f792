import { SubstrateShutdownError, TaskTimeoutError } from '../errors';
import { ExecutorStats, SubstratePolicy } from '../types';
import { logger } from '../../utils/logger';

export type TaskState = 'pending' | 'fulfilled' | 'rejected';

export type TaskFn<T> = () => Promise<T>;

/**
 * Awaitable reference to submitted work. The handle observes its own outcome,
 * so abandoning it after a timeout never surfaces as an unhandled rejection.
 */
export class TaskHandle<T> {
  readonly result: Promise<T>;
  readonly settled: Promise<void>;
  private _state: TaskState = 'pending';
  private _error: unknown;

  constructor(readonly id: number, result: Promise<T>) {
    this.result = result;
    this.settled = result.then(
      () => { this._state = 'fulfilled'; },
      (error: unknown) => {
        this._state = 'rejected';
        this._error = error;
      }
    );
  }

  get state(): TaskState {
    return this._state;
  }

  get error(): unknown {
    return this._error;
  }
}

export interface TaskSubstrate {
  readonly name: string;
  readonly policy: SubstratePolicy;
  submit<T>(fn: TaskFn<T>): TaskHandle<T>;
  /**
   * Wait for a task for at most `timeoutMs`. A timeout stops the waiter only;
   * the task keeps running.
   */
  awaitTask<T>(handle: TaskHandle<T>, timeoutMs: number): Promise<T>;
  /**
   * Resolves `true` when every in-flight task settled within the drain budget.
   */
  shutdown(drainTimeoutMs: number): Promise<boolean>;
  stats(): ExecutorStats | undefined;
}

export abstract class BaseSubstrate implements TaskSubstrate {
  abstract readonly policy: SubstratePolicy;
  private nextTaskId: number = 1;
  private inFlight: Set<TaskHandle<unknown>> = new Set();
  private shuttingDown: boolean = false;

  constructor(readonly name: string) {}

  submit<T>(fn: TaskFn<T>): TaskHandle<T> {
    if (this.shuttingDown) {
      throw new SubstrateShutdownError(this.name);
    }

    const handle = new TaskHandle(this.nextTaskId++, this.schedule(fn));
    this.inFlight.add(handle);
    handle.settled.then(() => this.inFlight.delete(handle));
    return handle;
  }

  async awaitTask<T>(handle: TaskHandle<T>, timeoutMs: number): Promise<T> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new TaskTimeoutError(handle.id, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([handle.result, timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async shutdown(drainTimeoutMs: number): Promise<boolean> {
    this.shuttingDown = true;
    const pending = [...this.inFlight].map(handle => handle.settled);

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      Promise.all(pending).then(() => true),
      new Promise<boolean>(resolve => {
        timeoutId = setTimeout(() => resolve(false), drainTimeoutMs);
      })
    ]);
    clearTimeout(timeoutId);

    this.onShutdown();
    if (!drained) {
      logger.warn(`⚠️ Substrate '${this.name}' shut down with ${this.inFlight.size} tasks still running`);
    }
    return drained;
  }

  get isShutdown(): boolean {
    return this.shuttingDown;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  abstract stats(): ExecutorStats | undefined;

  /**
   * Start `fn` under this policy; the returned promise settles with its outcome.
   * May throw synchronously to reject the submission.
   */
  protected abstract schedule<T>(fn: TaskFn<T>): Promise<T>;

  protected onShutdown(): void {}
}
