export interface TimingStats {
  min: number;
  max: number;
  avg: number;
  p95: number;
  p99: number;
}

export interface MemoryStats {
  min: number;
  max: number;
  avg: number;
}

export interface ErrorRate {
  count: number;
  rate: number;
}

export interface ErrorSample {
  time: string;
  message: string;
  trace_head: string[];
}

export interface MetricsSummary {
  total_operations: number;
  total_errors: number;
  /** Sum of every recorded timing, in milliseconds */
  total_duration: number;
}

export interface MetricsStatistics {
  timings: Record<string, TimingStats>;
  memory: Record<string, MemoryStats>;
  error_rates: Record<string, ErrorRate>;
  summary: MetricsSummary;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}
