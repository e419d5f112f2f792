import { PoolTimeoutError, ResourcePoolError } from './errors';
import { logger } from '../utils/logger';

export interface ResourcePoolConfig<T> {
  name: string;
  size: number;
  acquireTimeoutMs: number;
  create: () => T | Promise<T>;
  destroy?: (resource: T) => void | Promise<void>;
}

export interface ResourcePoolStatus {
  size: number;
  available: number;
  in_use: number;
}

/**
 * A leased resource. Owned by exactly one borrower until released.
 */
export class PoolHandle<T> {
  private released: boolean = false;

  constructor(
    readonly id: number,
    readonly resource: T,
    readonly pool: BoundedResourcePool<T>
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  markReleased(): void {
    this.released = true;
  }
}

interface Waiter<T> {
  resolve: (handle: PoolHandle<T>) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * Fixed-size checkout/release pool. Resources are created lazily up to `size`
 * and reused; waiters are served in arrival order.
 */
export class BoundedResourcePool<T> {
  private readonly config: ResourcePoolConfig<T>;
  private idle: T[] = [];
  private waiters: Waiter<T>[] = [];
  private created: number = 0;
  private inUse: number = 0;
  private nextHandleId: number = 1;
  private closed: boolean = false;

  constructor(config: ResourcePoolConfig<T>) {
    if (!Number.isInteger(config.size) || config.size < 1) {
      throw new ResourcePoolError(config.name, `size must be a positive integer, got ${config.size}`);
    }
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  async acquire(timeoutMs: number = this.config.acquireTimeoutMs): Promise<PoolHandle<T>> {
    if (this.closed) {
      throw new ResourcePoolError(this.config.name, 'pool is shut down');
    }

    const idleResource = this.idle.pop();
    if (idleResource !== undefined) {
      return this.lease(idleResource);
    }

    if (this.created < this.config.size) {
      // Reserve the slot before the (possibly async) factory runs
      this.created++;
      this.inUse++;
      try {
        const resource = await this.config.create();
        return this.wrap(resource);
      } catch (error) {
        this.created--;
        this.inUse--;
        throw error;
      }
    }

    return new Promise<PoolHandle<T>>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        timeoutId: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new PoolTimeoutError(this.config.name, timeoutMs));
        }, timeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  release(handle: PoolHandle<T>): void {
    if (handle.pool !== this) {
      throw new ResourcePoolError(this.config.name, `handle ${handle.id} belongs to pool '${handle.pool.name}'`);
    }
    if (handle.isReleased) {
      throw new ResourcePoolError(this.config.name, `handle ${handle.id} was already released`);
    }
    handle.markReleased();

    // Hand the resource straight to the oldest waiter; in_use stays the same
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timeoutId);
      next.resolve(this.wrap(handle.resource));
      return;
    }

    this.inUse--;
    if (this.closed) {
      this.created--;
      this.destroyLate(handle.resource);
      return;
    }
    this.idle.push(handle.resource);
  }

  /**
   * Scoped acquisition: the resource is released on every exit path of `fn`.
   */
  async use<R>(fn: (resource: T) => Promise<R>, timeoutMs?: number): Promise<R> {
    const handle = await this.acquire(timeoutMs);
    try {
      return await fn(handle.resource);
    } finally {
      this.release(handle);
    }
  }

  status(): ResourcePoolStatus {
    return {
      size: this.config.size,
      available: this.config.size - this.inUse,
      in_use: this.inUse
    };
  }

  waitingCount(): number {
    return this.waiters.length;
  }

  async shutdown(): Promise<void> {
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timeoutId);
      waiter.reject(new ResourcePoolError(this.config.name, 'pool is shut down'));
    }

    const idle = this.idle.splice(0);
    if (this.config.destroy) {
      for (const resource of idle) {
        await this.config.destroy(resource);
      }
    }
    this.created -= idle.length;
    logger.debug(`🧹 Pool '${this.config.name}' shut down (${idle.length} idle resources destroyed)`);
  }

  // Resources returned after shutdown are destroyed as they come back
  private destroyLate(resource: T): void {
    const destroy = this.config.destroy;
    if (!destroy) return;

    Promise.resolve()
      .then(() => destroy(resource))
      .catch(error => logger.warn(`⚠️ Pool '${this.config.name}' failed to destroy a returned resource:`, error));
  }

  private lease(resource: T): PoolHandle<T> {
    this.inUse++;
    return this.wrap(resource);
  }

  private wrap(resource: T): PoolHandle<T> {
    return new PoolHandle(this.nextHandleId++, resource, this);
  }
}
