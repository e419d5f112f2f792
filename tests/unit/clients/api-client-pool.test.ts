import { describe, it, expect } from 'vitest';
import { ApiClientPool } from '../../../src/clients/api-client-pool';
import { PoolTimeoutError } from '../../../src/core/errors';
import { FakeApiClient, failing } from '../../helpers/fakes';
import { deferred } from '../../helpers/deferred';

describe('ApiClientPool', () => {
  it('should lend clients and return them after use', async () => {
    const pool = new ApiClientPool('primary', { size: 2, acquireTimeoutMs: 100, create: () => new FakeApiClient('primary') });

    const result = await pool.withClient(client => client.fetch());

    expect(result.id).toBe('primary-1');
    expect(pool.name).toBe('primary');
    expect(pool.status()).toEqual({ size: 2, available: 2, in_use: 0 });
  });

  it('should return the client when the work fails', async () => {
    const pool = new ApiClientPool('secondary', {
      size: 1,
      acquireTimeoutMs: 100,
      create: () => new FakeApiClient('secondary', failing('secondary API Error'))
    });

    await expect(pool.withClient(client => client.fetch())).rejects.toThrow('secondary API Error');
    expect(pool.status()).toEqual({ size: 1, available: 1, in_use: 0 });
  });

  it('should fail with PoolTimeoutError when every client is busy', async () => {
    const pool = new ApiClientPool('primary', { size: 1, acquireTimeoutMs: 1000, create: () => new FakeApiClient('primary') });
    const blocker = deferred();
    const busy = pool.withClient(() => blocker.promise);

    await expect(pool.withClient(client => client.fetch(), 10)).rejects.toThrow(PoolTimeoutError);

    blocker.resolve();
    await busy;
  });

  it('should close idle clients on shutdown', async () => {
    const created: FakeApiClient[] = [];
    const pool = new ApiClientPool('primary', {
      size: 3,
      acquireTimeoutMs: 100,
      create: () => {
        const client = new FakeApiClient('primary');
        created.push(client);
        return client;
      }
    });
    await Promise.all([1, 2].map(() => pool.withClient(client => client.fetch())));

    await pool.shutdown();

    expect(created).toHaveLength(2);
    expect(created.every(client => client.closed)).toBe(true);
  });
});
