import { describe, it, expect, afterEach } from 'vitest';
import { FanoutImplementation, IMPLEMENTATION_NAMES } from '../../../src/core/implementation';
import { generateUnits } from '../../../src/core/unit-generator';
import { isSuccess } from '../../../src/core/types';
import { MetricsCollector } from '../../../src/metrics/collector';
import { PerformanceMetricsEvent } from '../../../src/core/batch-driver';
import { FakeApiClient, failing, testConfig } from '../../helpers/fakes';

describe('FanoutImplementation', () => {
  const implementations: FanoutImplementation[] = [];

  function track(implementation: FanoutImplementation): FanoutImplementation {
    implementations.push(implementation);
    return implementation;
  }

  afterEach(async () => {
    await Promise.all(implementations.splice(0).map(implementation => implementation.shutdown(1000)));
  });

  it('should name implementations after their policy', () => {
    expect(IMPLEMENTATION_NAMES).toEqual({
      'worker-pool': 'WorkerPoolImplementation',
      'cheap-task': 'CheapTaskImplementation'
    });

    const workerPool = track(new FanoutImplementation({ policy: 'worker-pool', config: testConfig() }));
    const cheapTask = track(new FanoutImplementation({ policy: 'cheap-task', config: testConfig() }));

    expect(workerPool.name).toBe('WorkerPoolImplementation');
    expect(workerPool.substrateName).toBe('worker-pool');
    expect(cheapTask.name).toBe('CheapTaskImplementation');
    expect(cheapTask.substrateName).toBe('cheap-task');
  });

  it('should fall back to a worker pool when cheap tasks are unavailable', async () => {
    const implementation = track(new FanoutImplementation({
      policy: 'cheap-task',
      config: testConfig(),
      probe: () => false
    }));

    expect(implementation.name).toBe('CheapTaskImplementation');
    expect(implementation.substrateName).toBe('cheap-task-fallback');
    expect(implementation.stats()?.pool_size).toBe(4);

    const results = await implementation.processBatch(generateUnits(20));
    expect(results.filter(isSuccess)).toHaveLength(20);
  });

  describe.each(['worker-pool', 'cheap-task'] as const)('%s end to end', policy => {
    it('should process 1000 units with every unit succeeding against error-free clients', async () => {
      const metrics = new MetricsCollector();
      const implementation = track(new FanoutImplementation({ policy, config: testConfig(), metrics }));
      const units = generateUnits(1000);
      const events: PerformanceMetricsEvent[] = [];
      implementation.driver.on('performance_metrics', (fields: PerformanceMetricsEvent) => events.push(fields));

      const results = await implementation.processBatch(units);

      expect(results).toHaveLength(1000);
      expect(results.map(result => result.unit_id)).toEqual(units.map(unit => unit.id));
      const successes = results.filter(isSuccess);
      expect(successes).toHaveLength(1000);
      expect(Object.keys(successes[0].merged_results)).toEqual(['primary', 'secondary']);
      expect(successes[0].merged_results.primary.source_name).toBe('primary');
      expect(metrics.timingSamples(`${implementation.name}/primary`)).toHaveLength(1000);
      expect(metrics.timingSamples(`${implementation.name}/secondary`)).toHaveLength(1000);
      expect(events).toHaveLength(1);
      expect(events[0].total_units).toBe(1000);
      expect(events[0].executor_stats === undefined).toBe(policy === 'cheap-task');
    }, 15000);
  });

  it('should fetch through the injected client factory', async () => {
    const created: FakeApiClient[] = [];
    const implementation = track(new FanoutImplementation({
      policy: 'cheap-task',
      config: testConfig(),
      clientFactory: config => {
        const client = new FakeApiClient(config.name);
        created.push(client);
        return client;
      }
    }));

    const results = await implementation.processBatch(generateUnits(5));

    expect(results.filter(isSuccess)).toHaveLength(5);
    expect(created.length).toBeGreaterThanOrEqual(2);
    expect(created.reduce((total, client) => total + client.calls, 0)).toBe(10);
  });

  it('should honour the strict override', async () => {
    const config = testConfig();
    config.cheap_task.unit_timeout_ms = 1000;
    config.cheap_task.batch_timeout_ms = 1;
    const implementation = track(new FanoutImplementation({
      policy: 'cheap-task',
      config,
      strict: true,
      clientFactory: clientConfig => new FakeApiClient(clientConfig.name, async () => {
        await new Promise(resolve => setTimeout(resolve, 50));
        return {};
      })
    }));

    await expect(implementation.processBatch(generateUnits(2))).rejects.toThrow('Batch failed after 0/2 units');
  });

  it('should report failed units from a failing upstream', async () => {
    const implementation = track(new FanoutImplementation({
      policy: 'worker-pool',
      config: testConfig(),
      clientFactory: config => new FakeApiClient(config.name, config.name === 'secondary' ? failing('secondary API Error') : undefined)
    }));

    const results = await implementation.processBatch(generateUnits(3));

    expect(results).toEqual(['0', '1', '2'].map(id => ({
      status: 'failure',
      kind: 'processing_error',
      unit_id: id,
      message: 'secondary API Error'
    })));
  });

  it('should close every client on shutdown', async () => {
    const created: FakeApiClient[] = [];
    const implementation = new FanoutImplementation({
      policy: 'worker-pool',
      config: testConfig(),
      clientFactory: config => {
        const client = new FakeApiClient(config.name);
        created.push(client);
        return client;
      }
    });
    await implementation.processBatch(generateUnits(3));

    await expect(implementation.shutdown(1000)).resolves.toBe(true);
    expect(created.length).toBeGreaterThan(0);
    expect(created.every(client => client.closed)).toBe(true);
  });
});
