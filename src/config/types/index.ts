import { ClientsConfig } from './client-config';
import { CheapTaskConfig, WorkerPoolConfig } from './substrate-config';
import { BenchmarkConfig, LoadConfig } from './load-config';
import { OutputConfig } from './output-config';

export * from './client-config';
export * from './substrate-config';
export * from './load-config';
export * from './output-config';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface BenchConfig {
  log_level: LogLevelName;
  /** Faker seed for reproducible mock payloads */
  seed?: number;
  clients: ClientsConfig;
  worker_pool: WorkerPoolConfig;
  cheap_task: CheapTaskConfig;
  benchmark: BenchmarkConfig;
  load: LoadConfig;
  output: OutputConfig;
}
