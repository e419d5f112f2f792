import { BenchConfig, ClientConfig, TimeoutConfig } from './types';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export class ConfigValidator {
  validate(config: BenchConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    this.validateClient('clients.primary', config.clients.primary, errors);
    this.validateClient('clients.secondary', config.clients.secondary, errors);
    if (config.clients.primary.name === config.clients.secondary.name) {
      errors.push(`Client names must differ (both are '${config.clients.primary.name}')`);
    }

    this.validateWorkerPool(config, errors, warnings);
    this.validateTimeouts('cheap_task', config.cheap_task, errors);
    if (!isPositiveInteger(config.cheap_task.fallback_workers)) {
      errors.push('cheap_task.fallback_workers must be a positive integer');
    }

    this.validateBenchmark(config, errors);
    this.validateLoad(config, errors, warnings);

    if (config.seed !== undefined && !Number.isInteger(config.seed)) {
      errors.push('seed must be an integer');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  private validateClient(where: string, client: ClientConfig, errors: string[]): void {
    if (!client.name) {
      errors.push(`${where}.name is required`);
    }
    if (client.latency_ms < 0) {
      errors.push(`${where}.latency_ms must not be negative`);
    }
    if (client.error_rate < 0 || client.error_rate > 1) {
      errors.push(`${where}.error_rate must be between 0 and 1`);
    }
    if (!isPositiveInteger(client.pool_size)) {
      errors.push(`${where}.pool_size must be a positive integer`);
    }
    if (client.acquire_timeout_ms <= 0) {
      errors.push(`${where}.acquire_timeout_ms must be positive`);
    }
  }

  private validateWorkerPool(config: BenchConfig, errors: string[], warnings: string[]): void {
    const pool = config.worker_pool;

    if (!Number.isInteger(pool.min_workers) || pool.min_workers < 0) {
      errors.push('worker_pool.min_workers must be a non-negative integer');
    }
    if (!isPositiveInteger(pool.max_workers)) {
      errors.push('worker_pool.max_workers must be a positive integer');
    }
    if (pool.min_workers > pool.max_workers) {
      errors.push(`worker_pool.min_workers (${pool.min_workers}) exceeds max_workers (${pool.max_workers})`);
    }
    if (!Number.isInteger(pool.max_queue) || pool.max_queue < 0) {
      errors.push('worker_pool.max_queue must be a non-negative integer');
    }
    if (pool.idle_timeout_ms <= 0) {
      errors.push('worker_pool.idle_timeout_ms must be positive');
    }
    if (pool.rejection_policy === 'abort') {
      warnings.push('worker_pool.rejection_policy "abort" turns saturation into failed units');
    }

    this.validateTimeouts('worker_pool', pool, errors);
  }

  private validateTimeouts(where: string, timeouts: TimeoutConfig, errors: string[]): void {
    if (timeouts.unit_timeout_ms <= 0) {
      errors.push(`${where}.unit_timeout_ms must be positive`);
    }
    if (timeouts.batch_timeout_ms <= timeouts.unit_timeout_ms) {
      errors.push(`${where}.batch_timeout_ms (${timeouts.batch_timeout_ms}) must exceed unit_timeout_ms (${timeouts.unit_timeout_ms})`);
    }
  }

  private validateBenchmark(config: BenchConfig, errors: string[]): void {
    const benchmark = config.benchmark;

    if (!isPositiveInteger(benchmark.units)) {
      errors.push('benchmark.units must be a positive integer');
    }
    if (!isPositiveInteger(benchmark.iterations)) {
      errors.push('benchmark.iterations must be a positive integer');
    }
    if (!Number.isInteger(benchmark.warmup_units) || benchmark.warmup_units < 0) {
      errors.push('benchmark.warmup_units must be a non-negative integer');
    }
    if (benchmark.warmup_timeout_ms <= 0) {
      errors.push('benchmark.warmup_timeout_ms must be positive');
    }
  }

  private validateLoad(config: BenchConfig, errors: string[], warnings: string[]): void {
    const load = config.load;
    const names = Object.keys(load.profiles);

    if (names.length === 0) {
      errors.push('At least one load profile must be configured');
    }

    for (const name of names) {
      const profile = load.profiles[name];
      if (!isPositiveInteger(profile.users)) {
        errors.push(`load.profiles.${name}.users must be a positive integer`);
      }
      if (profile.duration <= 0) {
        errors.push(`load.profiles.${name}.duration must be positive`);
      }
      if (profile.ramp_up < 0) {
        errors.push(`load.profiles.${name}.ramp_up must not be negative`);
      }
      if (profile.ramp_up >= profile.duration) {
        warnings.push(`load.profiles.${name}.ramp_up (${profile.ramp_up}s) is not shorter than its duration (${profile.duration}s); late users may never start`);
      }
      if (profile.users > 1000) {
        warnings.push(`High virtual user count (${profile.users}) in profile '${name}'`);
      }
    }

    if (!isPositiveInteger(load.units_per_user)) {
      errors.push('load.units_per_user must be a positive integer');
    }
    if (load.think_time_max_ms < 0) {
      errors.push('load.think_time_max_ms must not be negative');
    }
    if (load.monitor_interval_ms <= 0) {
      errors.push('load.monitor_interval_ms must be positive');
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
