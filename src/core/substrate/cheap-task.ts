import { BaseSubstrate, TaskFn } from './base';
import { SubstrateUnavailableError } from '../errors';

export interface CheapTaskOptions {
  name?: string;
  /** Capability check run once at construction */
  probe?: () => boolean;
}

export function supportsCheapTasks(): boolean {
  return typeof setImmediate === 'function';
}

/**
 * One independently scheduled task per submission, with no ceiling and no queue.
 * Concurrency is bounded only by what the tasks contend on downstream.
 */
export class CheapTaskSubstrate extends BaseSubstrate {
  readonly policy = 'cheap-task' as const;

  constructor(options: CheapTaskOptions = {}) {
    super(options.name ?? 'cheap-task');

    const probe = options.probe ?? supportsCheapTasks;
    if (!probe()) {
      throw new SubstrateUnavailableError(this.name, 'event-loop task scheduling is not supported on this host');
    }
  }

  stats(): undefined {
    return undefined;
  }

  protected schedule<T>(fn: TaskFn<T>): Promise<T> {
    return new Promise<void>(resolve => setImmediate(resolve)).then(fn);
  }
}
