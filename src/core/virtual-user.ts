import { BatchProcessor, WorkUnit } from './types';
import { RandomSource } from '../clients/base';
import { elapsedMs, sleep } from '../utils/time';

/**
 * Cooperative stop flag shared by every user of a run. Checked between iterations only.
 */
export class StopSignal {
  private stopped: boolean = false;

  stop(): void {
    this.stopped = true;
  }

  get isStopped(): boolean {
    return this.stopped;
  }
}

export type IterationOutcome =
  | { status: 'success'; duration_ms: number }
  | { status: 'error'; duration_ms: number; error: unknown };

export interface VirtualUserOptions {
  id: string;
  units: readonly WorkUnit[];
  processor: BatchProcessor;
  thinkTimeMaxMs: number;
  onIteration: (outcome: IterationOutcome) => void;
  random?: RandomSource;
}

/**
 * Replays the same batch of units against one processor until stopped,
 * pausing a random think time between iterations.
 */
export class VirtualUser {
  readonly id: string;
  readonly units: readonly WorkUnit[];
  private readonly processor: BatchProcessor;
  private readonly thinkTimeMaxMs: number;
  private readonly onIteration: (outcome: IterationOutcome) => void;
  private readonly random: RandomSource;
  private completed: number = 0;

  constructor(options: VirtualUserOptions) {
    this.id = options.id;
    this.units = options.units;
    this.processor = options.processor;
    this.thinkTimeMaxMs = options.thinkTimeMaxMs;
    this.onIteration = options.onIteration;
    this.random = options.random ?? Math.random;
  }

  get iterations(): number {
    return this.completed;
  }

  async run(stop: StopSignal): Promise<void> {
    while (!stop.isStopped) {
      await this.iterate();
      if (stop.isStopped) break;
      await sleep(this.random() * this.thinkTimeMaxMs);
    }
  }

  private async iterate(): Promise<void> {
    const startMark = performance.now();
    let outcome: IterationOutcome;

    try {
      await this.processor.processBatch(this.units);
      outcome = { status: 'success', duration_ms: elapsedMs(startMark) };
    } catch (error) {
      outcome = { status: 'error', duration_ms: elapsedMs(startMark), error };
    }

    this.completed++;
    this.onIteration(outcome);
  }
}
