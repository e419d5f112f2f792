import { BatchDriver } from './batch-driver';
import { UnitProcessor } from './unit-processor';
import { createSubstrate, TaskSubstrate } from './substrate';
import { BatchProcessor, ExecutorStats, ProcessedUnit, SubstratePolicy, WorkUnit } from './types';
import { ApiClient } from '../clients/base';
import { ApiClientPool } from '../clients/api-client-pool';
import { MockApiClient } from '../clients/mock-api-client';
import { BenchConfig, ClientConfig, TimeoutConfig } from '../config/types';
import { MetricsCollector } from '../metrics/collector';
import { errorMessage, logger } from '../utils/logger';

export type ImplementationConfig = Pick<BenchConfig, 'clients' | 'worker_pool' | 'cheap_task'>;

export type ClientFactory = (config: ClientConfig) => ApiClient;

export interface FanoutImplementationOptions {
  policy: SubstratePolicy;
  config: ImplementationConfig;
  metrics?: MetricsCollector;
  /** Defaults to MockApiClient built from the client config */
  clientFactory?: ClientFactory;
  /** Overrides the `strict` flag of the policy's timeout config */
  strict?: boolean;
  /** Overrides the cheap-task capability check */
  probe?: () => boolean;
}

export const IMPLEMENTATION_NAMES: Readonly<Record<SubstratePolicy, string>> = {
  'worker-pool': 'WorkerPoolImplementation',
  'cheap-task': 'CheapTaskImplementation'
};

const mockClientFactory: ClientFactory = config => new MockApiClient(config.name, {
  latencyMs: config.latency_ms,
  errorRate: config.error_rate
});

/**
 * One complete processing strategy: a substrate, the client pools it fetches
 * through, a UnitProcessor and a BatchDriver.
 */
export class FanoutImplementation implements BatchProcessor {
  readonly name: string;
  readonly policy: SubstratePolicy;
  readonly processor: UnitProcessor;
  readonly driver: BatchDriver;
  private readonly substrate: TaskSubstrate;
  private readonly pools: readonly [ApiClientPool, ApiClientPool];

  constructor(options: FanoutImplementationOptions) {
    const { config, policy } = options;
    const timeouts: TimeoutConfig = policy === 'worker-pool' ? config.worker_pool : config.cheap_task;
    const factory = options.clientFactory ?? mockClientFactory;

    this.name = IMPLEMENTATION_NAMES[policy];
    this.policy = policy;
    this.substrate = createSubstrate(policy, config, { probe: options.probe });
    this.pools = [
      createClientPool(config.clients.primary, factory),
      createClientPool(config.clients.secondary, factory)
    ];
    this.processor = new UnitProcessor({
      implementation: this.name,
      substrate: this.substrate,
      sources: this.pools,
      unitTimeoutMs: timeouts.unit_timeout_ms,
      metrics: options.metrics
    });
    this.driver = new BatchDriver({
      substrate: this.substrate,
      processor: this.processor,
      batchTimeoutMs: timeouts.batch_timeout_ms,
      strict: options.strict ?? timeouts.strict
    });

    logger.debug(`🔧 ${this.name} ready on substrate '${this.substrate.name}'`);
  }

  processBatch(units: readonly WorkUnit[]): Promise<ProcessedUnit[]> {
    return this.driver.processBatch(units);
  }

  get substrateName(): string {
    return this.substrate.name;
  }

  stats(): ExecutorStats | undefined {
    return this.substrate.stats();
  }

  /**
   * Drain the substrate, then close the client pools. Resolves whether the drain completed.
   */
  async shutdown(drainTimeoutMs: number = 5000): Promise<boolean> {
    let drained = false;
    try {
      drained = await this.substrate.shutdown(drainTimeoutMs);
    } catch (error) {
      logger.error(`❌ Error during shutdown of ${this.name}: ${errorMessage(error)}`);
    }

    await Promise.all(this.pools.map(pool => pool.shutdown()));
    return drained;
  }
}

function createClientPool(config: ClientConfig, factory: ClientFactory): ApiClientPool {
  return new ApiClientPool(config.name, {
    size: config.pool_size,
    acquireTimeoutMs: config.acquire_timeout_ms,
    create: () => factory(config)
  });
}
