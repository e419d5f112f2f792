export interface LoadProfile {
  users: number;
  /** Seconds */
  duration: number;
  /** Seconds */
  ramp_up: number;
}

export interface LoadConfig {
  profiles: Record<string, LoadProfile>;
  units_per_user: number;
  think_time_max_ms: number;
  monitor_interval_ms: number;
}

export interface BenchmarkConfig {
  units: number;
  iterations: number;
  warmup_units: number;
  warmup_timeout_ms: number;
}
