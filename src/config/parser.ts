import * as YAML from 'yaml';
import * as fs from 'fs';
import * as path from 'path';
import { createDefaultConfig } from './defaults';
import {
  BenchConfig,
  CheapTaskConfig,
  ClientConfig,
  LoadProfile,
  LogLevelName,
  RejectionPolicyName,
  WorkerPoolConfig
} from './types';
import { ConfigurationError } from '../core/errors';
import { logger } from '../utils/logger';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];
const REJECTION_POLICIES: readonly RejectionPolicyName[] = ['caller_runs', 'abort'];

/**
 * Reads typed values out of an untyped overlay section, falling back to the
 * base value when a key is absent and collecting an error when it has the wrong type.
 */
class SectionReader {
  constructor(
    private readonly raw: RawSection,
    private readonly where: string,
    private readonly errors: string[]
  ) {}

  number(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      this.errors.push(`${this.where}.${key} must be a number`);
      return fallback;
    }
    return value;
  }

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') {
      this.errors.push(`${this.where}.${key} must be a string`);
      return fallback;
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.errors.push(`${this.where}.${key} must be a boolean`);
      return fallback;
    }
    return value;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      this.errors.push(`${this.where}.${key} must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }

  section(key: string): SectionReader {
    const value = this.raw[key];
    if (value !== undefined && !isRecord(value)) {
      this.errors.push(`${this.where}.${key} must be a mapping`);
    }
    return new SectionReader(isRecord(value) ? value : {}, `${this.where}.${key}`, this.errors);
  }

  keys(): string[] {
    return Object.keys(this.raw);
  }
}

export class ConfigParser {
  /**
   * Load a config file (YAML or JSON) over the defaults. Without a path the
   * defaults are returned as-is. An environment name layers
   * `environments/<env>.yml` (or a sibling `<env>.yml`) on top.
   */
  async parse(configPath?: string, environment?: string): Promise<BenchConfig> {
    let config = createDefaultConfig();

    if (configPath) {
      if (!fs.existsSync(configPath)) {
        throw new ConfigurationError(`Configuration file not found: ${configPath}`);
      }
      logger.debug(`Loading configuration: ${configPath}`);
      config = this.merge(config, this.parseContent(fs.readFileSync(configPath, 'utf8'), configPath));
    }

    if (environment) {
      const baseDir = configPath ? path.dirname(configPath) : process.cwd();
      config = this.merge(config, this.loadEnvironmentConfig(environment, baseDir));
    }

    return config;
  }

  parseContent(content: string, source: string = '<inline>'): unknown {
    const trimmed = content.trim();
    if (trimmed === '') return {};

    try {
      return trimmed.startsWith('{') ? JSON.parse(trimmed) : YAML.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse ${source}: ${reason}`);
    }
  }

  /**
   * Overlay a raw (untyped) document onto a typed config
   */
  merge(base: BenchConfig, overlay: unknown): BenchConfig {
    if (overlay === null || overlay === undefined) return base;
    if (!isRecord(overlay)) {
      throw new ConfigurationError('Configuration root must be a mapping');
    }

    const errors: string[] = [];
    const root = new SectionReader(overlay, 'config', errors);

    const seedRaw = overlay.seed;
    const clients = root.section('clients');
    const merged: BenchConfig = {
      log_level: root.oneOf('log_level', LOG_LEVELS, base.log_level),
      seed: seedRaw === undefined ? base.seed : root.number('seed', base.seed ?? 0),
      clients: {
        primary: this.mergeClient(clients.section('primary'), base.clients.primary),
        secondary: this.mergeClient(clients.section('secondary'), base.clients.secondary)
      },
      worker_pool: this.mergeWorkerPool(root.section('worker_pool'), base.worker_pool),
      cheap_task: this.mergeCheapTask(root.section('cheap_task'), base.cheap_task),
      benchmark: this.mergeBenchmark(root.section('benchmark'), base),
      load: this.mergeLoad(root.section('load'), base),
      output: this.mergeOutput(root.section('output'), base)
    };

    if (errors.length > 0) {
      throw new ConfigurationError('Invalid configuration', errors);
    }
    return merged;
  }

  private mergeClient(reader: SectionReader, base: ClientConfig): ClientConfig {
    return {
      name: reader.string('name', base.name),
      latency_ms: reader.number('latency_ms', base.latency_ms),
      error_rate: reader.number('error_rate', base.error_rate),
      pool_size: reader.number('pool_size', base.pool_size),
      acquire_timeout_ms: reader.number('acquire_timeout_ms', base.acquire_timeout_ms)
    };
  }

  private mergeWorkerPool(reader: SectionReader, base: WorkerPoolConfig): WorkerPoolConfig {
    return {
      min_workers: reader.number('min_workers', base.min_workers),
      max_workers: reader.number('max_workers', base.max_workers),
      max_queue: reader.number('max_queue', base.max_queue),
      idle_timeout_ms: reader.number('idle_timeout_ms', base.idle_timeout_ms),
      rejection_policy: reader.oneOf('rejection_policy', REJECTION_POLICIES, base.rejection_policy),
      unit_timeout_ms: reader.number('unit_timeout_ms', base.unit_timeout_ms),
      batch_timeout_ms: reader.number('batch_timeout_ms', base.batch_timeout_ms),
      strict: reader.boolean('strict', base.strict)
    };
  }

  private mergeCheapTask(reader: SectionReader, base: CheapTaskConfig): CheapTaskConfig {
    return {
      fallback_workers: reader.number('fallback_workers', base.fallback_workers),
      unit_timeout_ms: reader.number('unit_timeout_ms', base.unit_timeout_ms),
      batch_timeout_ms: reader.number('batch_timeout_ms', base.batch_timeout_ms),
      strict: reader.boolean('strict', base.strict)
    };
  }

  private mergeBenchmark(reader: SectionReader, base: BenchConfig): BenchConfig['benchmark'] {
    return {
      units: reader.number('units', base.benchmark.units),
      iterations: reader.number('iterations', base.benchmark.iterations),
      warmup_units: reader.number('warmup_units', base.benchmark.warmup_units),
      warmup_timeout_ms: reader.number('warmup_timeout_ms', base.benchmark.warmup_timeout_ms)
    };
  }

  private mergeLoad(reader: SectionReader, base: BenchConfig): BenchConfig['load'] {
    const profiles: Record<string, LoadProfile> = { ...base.load.profiles };
    const profileReader = reader.section('profiles');

    for (const name of profileReader.keys()) {
      const entry = profileReader.section(name);
      const existing = profiles[name];
      profiles[name] = {
        users: entry.number('users', existing?.users ?? 1),
        duration: entry.number('duration', existing?.duration ?? 10),
        ramp_up: entry.number('ramp_up', existing?.ramp_up ?? 0)
      };
    }

    return {
      profiles,
      units_per_user: reader.number('units_per_user', base.load.units_per_user),
      think_time_max_ms: reader.number('think_time_max_ms', base.load.think_time_max_ms),
      monitor_interval_ms: reader.number('monitor_interval_ms', base.load.monitor_interval_ms)
    };
  }

  private mergeOutput(reader: SectionReader, base: BenchConfig): BenchConfig['output'] {
    return {
      results_dir: reader.string('results_dir', base.output.results_dir),
      log_dir: reader.string('log_dir', base.output.log_dir),
      tmp_dir: reader.string('tmp_dir', base.output.tmp_dir)
    };
  }

  private loadEnvironmentConfig(environment: string, baseDir: string): unknown {
    const envPaths = [
      path.join(baseDir, 'environments', `${environment}.yml`),
      path.join(baseDir, 'environments', `${environment}.yaml`),
      path.join(baseDir, 'environments', `${environment}.json`),
      path.join(baseDir, `${environment}.yml`),
      path.join(baseDir, `${environment}.yaml`),
      path.join(baseDir, `${environment}.json`)
    ];

    for (const envPath of envPaths) {
      if (fs.existsSync(envPath)) {
        logger.debug(`Loading environment overlay: ${envPath}`);
        return this.parseContent(fs.readFileSync(envPath, 'utf8'), envPath);
      }
    }

    throw new ConfigurationError(`Environment configuration not found for: ${environment}. Searched paths: ${envPaths.join(', ')}`);
  }
}
