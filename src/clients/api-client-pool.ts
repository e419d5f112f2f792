import { ApiClient } from './base';
import { BoundedResourcePool, ResourcePoolStatus } from '../core/resource-pool';
import { errorMessage, logger } from '../utils/logger';

export interface ApiClientPoolOptions {
  size: number;
  acquireTimeoutMs: number;
  create: () => ApiClient;
}

/**
 * Fixed set of reusable clients for one upstream. Work borrowed through
 * `withClient` returns its client on every exit path.
 */
export class ApiClientPool {
  private readonly pool: BoundedResourcePool<ApiClient>;

  constructor(readonly name: string, options: ApiClientPoolOptions) {
    this.pool = new BoundedResourcePool<ApiClient>({
      name,
      size: options.size,
      acquireTimeoutMs: options.acquireTimeoutMs,
      create: options.create,
      destroy: client => client.close?.()
    });
  }

  async withClient<R>(fn: (client: ApiClient) => Promise<R>, timeoutMs?: number): Promise<R> {
    return this.pool.use(async client => {
      try {
        return await fn(client);
      } catch (error) {
        logger.error(`❌ Error in ${client.name} client: ${errorMessage(error)}`);
        throw error;
      }
    }, timeoutMs);
  }

  status(): ResourcePoolStatus {
    return this.pool.status();
  }

  async shutdown(): Promise<void> {
    await this.pool.shutdown();
  }
}
