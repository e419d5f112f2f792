export type RejectionPolicyName = 'caller_runs' | 'abort';

export interface TimeoutConfig {
  /** Per sub-fetch await inside one unit */
  unit_timeout_ms: number;
  /** Per unit await at batch level; must exceed unit_timeout_ms */
  batch_timeout_ms: number;
  /** Raise BatchFailureError with partial results instead of returning [] */
  strict: boolean;
}

export interface WorkerPoolConfig extends TimeoutConfig {
  min_workers: number;
  max_workers: number;
  max_queue: number;
  idle_timeout_ms: number;
  rejection_policy: RejectionPolicyName;
}

export interface CheapTaskConfig extends TimeoutConfig {
  /** Fixed worker count used when cheap tasks are unavailable */
  fallback_workers: number;
}
