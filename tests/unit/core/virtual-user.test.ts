import { describe, it, expect } from 'vitest';
import { IterationOutcome, StopSignal, VirtualUser } from '../../../src/core/virtual-user';
import { generateUnits } from '../../../src/core/unit-generator';
import { FakeBatchProcessor } from '../../helpers/fakes';

describe('VirtualUser', () => {
  it('should replay its batch until stopped', async () => {
    const processor = new FakeBatchProcessor('impl', 5);
    const outcomes: IterationOutcome[] = [];
    const stop = new StopSignal();
    const vu = new VirtualUser({
      id: 'user_0',
      units: generateUnits(3),
      processor,
      thinkTimeMaxMs: 0,
      onIteration: outcome => {
        outcomes.push(outcome);
        if (outcomes.length === 4) stop.stop();
      }
    });

    await vu.run(stop);

    expect(vu.iterations).toBe(4);
    expect(processor.batches).toBe(4);
    expect(outcomes.every(outcome => outcome.status === 'success')).toBe(true);
    expect(outcomes[0].duration_ms).toBeGreaterThan(0);
  });

  it('should report a failed iteration and keep going', async () => {
    const processor = new FakeBatchProcessor('impl', 1, batch => batch === 1);
    const outcomes: IterationOutcome[] = [];
    const stop = new StopSignal();
    const vu = new VirtualUser({
      id: 'user_1',
      units: generateUnits(1),
      processor,
      thinkTimeMaxMs: 0,
      onIteration: outcome => {
        outcomes.push(outcome);
        if (outcomes.length === 2) stop.stop();
      }
    });

    await vu.run(stop);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['error', 'success']);
    expect(outcomes[0]).toEqual({ status: 'error', duration_ms: expect.any(Number), error: new Error('batch 1 failed') });
  });

  it('should not start when already stopped', async () => {
    const processor = new FakeBatchProcessor('impl');
    const stop = new StopSignal();
    stop.stop();
    const vu = new VirtualUser({
      id: 'user_2',
      units: generateUnits(1),
      processor,
      thinkTimeMaxMs: 100,
      onIteration: () => {}
    });

    await vu.run(stop);

    expect(vu.iterations).toBe(0);
  });

  it('should think for random() * think_time_max_ms between iterations', async () => {
    const processor = new FakeBatchProcessor('impl', 0);
    const stop = new StopSignal();
    let iterations = 0;
    const vu = new VirtualUser({
      id: 'user_3',
      units: generateUnits(1),
      processor,
      thinkTimeMaxMs: 100,
      random: () => 0.5,
      onIteration: () => {
        iterations++;
        if (iterations === 3) stop.stop();
      }
    });

    const start = performance.now();
    await vu.run(stop);

    expect(performance.now() - start).toBeGreaterThanOrEqual(95);
  });
});
