import { ErrorSample } from '../types';
import { TimestampHelper } from '../../utils/timestamp-helper';

const TRACE_HEAD_LINES = 5;

/**
 * Error samples grouped by key, with the first stack lines of each error kept.
 */
export class ErrorTracker {
  private errors: Map<string, ErrorSample[]> = new Map();

  clear(): void {
    this.errors.clear();
  }

  trackError(key: string, error: unknown): ErrorSample {
    const sample: ErrorSample = {
      time: TimestampHelper.now(),
      message: error instanceof Error ? error.message : String(error),
      trace_head: traceHead(error)
    };

    const samples = this.errors.get(key);
    if (samples) {
      samples.push(sample);
    } else {
      this.errors.set(key, [sample]);
    }
    return sample;
  }

  keys(): string[] {
    return [...this.errors.keys()];
  }

  getErrors(key: string): ErrorSample[] {
    return [...(this.errors.get(key) ?? [])];
  }

  count(key: string): number {
    return this.errors.get(key)?.length ?? 0;
  }

  totalCount(): number {
    let total = 0;
    for (const samples of this.errors.values()) total += samples.length;
    return total;
  }

  getErrorDistribution(): Record<string, number> {
    const distribution: Record<string, number> = {};
    for (const samples of this.errors.values()) {
      for (const sample of samples) {
        distribution[sample.message] = (distribution[sample.message] || 0) + 1;
      }
    }
    return distribution;
  }
}

function traceHead(error: unknown): string[] {
  if (!(error instanceof Error) || !error.stack) return [];
  return error.stack.split('\n').slice(0, TRACE_HEAD_LINES);
}
