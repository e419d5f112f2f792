import * as os from 'os';
import { BenchConfig, LoadProfile } from './types';

export const LOAD_PROFILES: Readonly<Record<string, LoadProfile>> = {
  light: { users: 10, duration: 30, ramp_up: 5 },
  medium: { users: 50, duration: 60, ramp_up: 10 },
  heavy: { users: 100, duration: 120, ramp_up: 20 }
};

export function processorCount(): number {
  return Math.max(1, os.availableParallelism());
}

export function createDefaultConfig(): BenchConfig {
  const cpus = processorCount();

  return {
    log_level: 'info',
    clients: {
      primary: { name: 'primary', latency_ms: 100, error_rate: 0.01, pool_size: 64, acquire_timeout_ms: 5000 },
      secondary: { name: 'secondary', latency_ms: 150, error_rate: 0.01, pool_size: 64, acquire_timeout_ms: 5000 }
    },
    worker_pool: {
      min_workers: 2,
      max_workers: cpus * 2,
      max_queue: cpus * 4,
      idle_timeout_ms: 60000,
      rejection_policy: 'caller_runs',
      unit_timeout_ms: 1000,
      batch_timeout_ms: 2000,
      strict: false
    },
    cheap_task: {
      fallback_workers: cpus * 2,
      unit_timeout_ms: 2000,
      batch_timeout_ms: 5000,
      strict: false
    },
    benchmark: {
      units: 1000,
      iterations: 3,
      warmup_units: 10,
      warmup_timeout_ms: 5000
    },
    load: {
      profiles: { ...LOAD_PROFILES },
      units_per_user: 10,
      think_time_max_ms: 500,
      monitor_interval_ms: 1000
    },
    output: {
      results_dir: 'results',
      log_dir: 'log',
      tmp_dir: 'tmp'
    }
  };
}
