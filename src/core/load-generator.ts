import { EventEmitter } from 'events';
import { BatchProcessor } from './types';
import { IterationOutcome, StopSignal, VirtualUser } from './virtual-user';
import { generateUnits } from './unit-generator';
import { LoadPattern, VUFactory } from '../load-patterns/base';
import { RampedPattern } from '../load-patterns/ramped';
import { LoadConfig, LoadProfile } from '../config/types';
import { RandomSource } from '../clients/base';
import { MetricsCollector } from '../metrics/collector';
import { LatencyStats } from '../metrics/types';
import { summarizeLatency } from '../metrics/core/statistics-engine';
import { errorMessage, logger } from '../utils/logger';
import { elapsedMs, roundTo, sleep } from '../utils/time';
import { TimestampHelper } from '../utils/timestamp-helper';

export type LoadRunState = 'idle' | 'ramping_up' | 'steady' | 'stopping' | 'reported';

export interface ProfileResult {
  /** Requests per second over the nominal profile duration */
  throughput: number;
  /** Percentage, 0-100 */
  error_rate: number;
  latency: LatencyStats;
  total_requests: number;
  total_errors: number;
  duration: number;
}

/** profile name → implementation name → result (`null` when no request succeeded) */
export type LoadTestReport = Record<string, Record<string, ProfileResult | null>>;

export interface ImplementationComparison {
  throughput_improvement: number;
  latency_improvement: number;
  error_rate_difference: number;
}

export type LoadComparison = Record<string, ImplementationComparison | null>;

export type StateEvent = {
  profile: string;
  implementation: string;
  from: LoadRunState;
  to: LoadRunState;
};

export type ProgressEvent = {
  profile: string;
  implementation: string;
  requests: number;
  throughput: number;
  error_rate: number;
  remaining_seconds: number;
};

export type VUStartEvent = {
  profile: string;
  implementation: string;
  vu_id: string;
  start_time: string;
};

export interface IterationError {
  message: string;
  time: string;
}

export interface LoadGeneratorOptions {
  /** Profiles to run, in order */
  profiles: Record<string, LoadProfile>;
  implementations: readonly BatchProcessor[];
  load: Omit<LoadConfig, 'profiles'>;
  metrics?: MetricsCollector;
  pattern?: LoadPattern;
  /** Drives think times */
  random?: RandomSource;
}

/**
 * Per-run tallies. Users append from their own async loops; the monitor
 * reads the counters while the run is in progress.
 */
class RunRecorder {
  requests: number = 0;
  errors: number = 0;
  readonly durations: number[] = [];
  readonly errorLog: IterationError[] = [];

  record(outcome: IterationOutcome): void {
    this.requests++;
    if (outcome.status === 'success') {
      this.durations.push(outcome.duration_ms);
    } else {
      this.errors++;
      this.errorLog.push({ message: errorMessage(outcome.error), time: TimestampHelper.now() });
    }
  }

  errorRate(): number {
    return this.requests > 0 ? (this.errors / this.requests) * 100 : 0;
  }
}

/**
 * Drives every implementation through every profile: ramped virtual users,
 * a monitor that ends the run after `duration`, and a per-run analysis.
 *
 * Events: `state`, `progress`, `vu_start`.
 */
export class LoadGenerator extends EventEmitter {
  private readonly options: LoadGeneratorOptions;
  private readonly pattern: LoadPattern;
  private currentState: LoadRunState = 'idle';

  constructor(options: LoadGeneratorOptions) {
    super();
    this.options = options;
    this.pattern = options.pattern ?? new RampedPattern();
  }

  get state(): LoadRunState {
    return this.currentState;
  }

  async run(): Promise<LoadTestReport> {
    const report: LoadTestReport = {};

    for (const [profileName, profile] of Object.entries(this.options.profiles)) {
      logger.info(`🚀 Running ${profileName} load profile...`);
      report[profileName] = {};

      for (const implementation of this.options.implementations) {
        logger.info(`Testing ${implementation.name}...`);
        const result = await this.runProfile(profileName, profile, implementation);
        report[profileName][implementation.name] = result;
        logProfileResult(profileName, implementation.name, result);
      }
    }

    return report;
  }

  /**
   * One implementation under one profile. Never rejects because of a user iteration.
   */
  async runProfile(profileName: string, profile: LoadProfile, implementation: BatchProcessor): Promise<ProfileResult | null> {
    const recorder = new RunRecorder();
    const stop = new StopSignal();
    const context = { profile: profileName, implementation: implementation.name };
    const { metrics } = this.options;
    let started = 0;

    this.currentState = 'idle';
    this.transition(context, 'ramping_up');

    const vuFactory: VUFactory = {
      create: index => new VirtualUser({
        id: `user_${index}`,
        units: generateUnits(this.options.load.units_per_user, { ids: 'uuid' }),
        processor: implementation,
        thinkTimeMaxMs: this.options.load.think_time_max_ms,
        random: this.options.random,
        onIteration: outcome => {
          recorder.record(outcome);
          if (outcome.status === 'success') {
            metrics?.recordTiming(implementation.name, outcome.duration_ms);
          } else {
            metrics?.recordError(implementation.name, outcome.error);
          }
        }
      }),
      recordStart: vu => {
        started++;
        const fields: VUStartEvent = { ...context, vu_id: vu.id, start_time: TimestampHelper.now() };
        this.emit('vu_start', fields);
        if (started === profile.users && this.currentState === 'ramping_up') {
          this.transition(context, 'steady');
        }
      }
    };

    const startMark = performance.now();
    const users = this.pattern.execute(profile, vuFactory, stop);
    const monitor = this.monitor(context, profile, recorder, startMark).then(() => {
      stop.stop();
      this.transition(context, 'stopping');
    });
    await Promise.all([users, monitor]);

    metrics?.recordMemory(implementation.name);
    const result = analyzeResults(recorder.durations, recorder.errors, recorder.requests, profile);
    if (recorder.errorLog.length > 0) {
      logger.debug(`${implementation.name} recorded ${recorder.errorLog.length} failed iterations, first: ${recorder.errorLog[0].message}`);
    }
    this.transition(context, 'reported');
    return result;
  }

  private async monitor(
    context: { profile: string; implementation: string },
    profile: LoadProfile,
    recorder: RunRecorder,
    startMark: number
  ): Promise<void> {
    const durationMs = profile.duration * 1000;
    const intervalMs = this.options.load.monitor_interval_ms;

    for (;;) {
      const elapsed = elapsedMs(startMark);
      if (elapsed >= durationMs) break;

      const fields: ProgressEvent = {
        ...context,
        requests: recorder.requests,
        throughput: elapsed > 0 ? roundTo(recorder.requests / (elapsed / 1000)) : 0,
        error_rate: roundTo(recorder.errorRate()),
        remaining_seconds: Math.round((durationMs - elapsed) / 1000)
      };
      logger.debug(`Requests: ${fields.requests} | Throughput: ${fields.throughput} req/s | Errors: ${fields.error_rate}% | Time remaining: ${fields.remaining_seconds}s`);
      this.emit('progress', fields);

      await sleep(Math.min(intervalMs, durationMs - elapsed));
    }
  }

  private transition(context: { profile: string; implementation: string }, to: LoadRunState): void {
    const fields: StateEvent = { ...context, from: this.currentState, to };
    this.currentState = to;
    logger.debug(`${context.implementation} [${context.profile}]: ${fields.from} → ${to}`);
    this.emit('state', fields);
  }
}

/**
 * Throughput over the nominal duration, error rate as a percentage and
 * latency percentiles in ms. `null` when no iteration succeeded.
 */
export function analyzeResults(
  durationsMs: readonly number[],
  totalErrors: number,
  totalRequests: number,
  profile: LoadProfile
): ProfileResult | null {
  const latency = summarizeLatency(durationsMs);
  if (!latency) return null;

  return {
    throughput: totalRequests / profile.duration,
    error_rate: totalRequests > 0 ? (totalErrors / totalRequests) * 100 : 0,
    latency,
    total_requests: totalRequests,
    total_errors: totalErrors,
    duration: profile.duration
  };
}

/**
 * How `candidate` fares against `baseline` per profile. Positive improvements
 * favour the candidate. `null` where either side has no result.
 */
export function compareImplementations(
  report: LoadTestReport,
  baseline: string,
  candidate: string
): LoadComparison {
  const comparison: LoadComparison = {};

  for (const [profileName, results] of Object.entries(report)) {
    const base = results[baseline];
    const cand = results[candidate];
    if (!base || !cand) {
      comparison[profileName] = null;
      continue;
    }

    comparison[profileName] = {
      throughput_improvement: roundTo(relativeChange(cand.throughput - base.throughput, base.throughput)),
      latency_improvement: roundTo(relativeChange(base.latency.avg - cand.latency.avg, base.latency.avg)),
      error_rate_difference: roundTo(cand.error_rate - base.error_rate)
    };
  }

  return comparison;
}

function relativeChange(delta: number, reference: number): number {
  return reference === 0 ? 0 : (delta / reference) * 100;
}

function logProfileResult(profileName: string, implementation: string, result: ProfileResult | null): void {
  if (!result) {
    logger.warn(`⚠️ ${implementation} produced no successful requests for the ${profileName} profile`);
    return;
  }

  logger.info(`${implementation} results for ${profileName} profile:`);
  logger.info(`  Throughput: ${result.throughput.toFixed(2)} req/s`);
  logger.info(`  Error rate: ${result.error_rate.toFixed(2)}%`);
  logger.info(`  Latency (ms): min ${result.latency.min}, avg ${result.latency.avg}, max ${result.latency.max}, p90 ${result.latency.p90}, p95 ${result.latency.p95}, p99 ${result.latency.p99}`);
  logger.info(`  Total requests: ${result.total_requests}, total errors: ${result.total_errors}`);
}
