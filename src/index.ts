// Public API (builds to dist/src/index.js)

export { FanoutImplementation, IMPLEMENTATION_NAMES } from './core/implementation';
export type { FanoutImplementationOptions, ImplementationConfig, ClientFactory } from './core/implementation';
export { UnitProcessor } from './core/unit-processor';
export { BatchDriver } from './core/batch-driver';
export { BoundedResourcePool, PoolHandle } from './core/resource-pool';
export type { ResourcePoolConfig, ResourcePoolStatus } from './core/resource-pool';
export { createSubstrate, WorkerPoolSubstrate, CheapTaskSubstrate, TaskHandle } from './core/substrate';
export type { TaskSubstrate } from './core/substrate';
export { LoadGenerator, analyzeResults, compareImplementations } from './core/load-generator';
export type { LoadTestReport, ProfileResult, LoadRunState } from './core/load-generator';
export { BenchmarkRunner, compareBenchmarks, summarizeBenchmark } from './core/benchmark-runner';
export type { BenchmarkReport } from './core/benchmark-runner';
export { generateUnits } from './core/unit-generator';
export { inspectEnvironment } from './core/environment';
export * from './core/errors';
export * from './core/types';

export { MockApiClient, ApiClientPool, SimulatedApiError } from './clients';
export type { ApiClient } from './clients';

export { MetricsCollector } from './metrics/collector';
export { percentile } from './metrics/core/statistics-engine';

export { ConfigParser } from './config/parser';
export { ConfigValidator } from './config/validator';
export { createDefaultConfig, LOAD_PROFILES } from './config/defaults';
export type { BenchConfig, LoadProfile } from './config/types';

export { JSONResultWriter } from './outputs/json';
