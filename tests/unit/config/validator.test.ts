import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigValidator } from '../../../src/config/validator';
import { createDefaultConfig } from '../../../src/config/defaults';
import { BenchConfig } from '../../../src/config/types';

describe('ConfigValidator', () => {
  let validator: ConfigValidator;
  let config: BenchConfig;

  beforeEach(() => {
    validator = new ConfigValidator();
    config = createDefaultConfig();
  });

  describe('validate()', () => {
    it('should accept the default configuration without warnings', () => {
      const result = validator.validate(config);

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    describe('timeouts', () => {
      it('should reject a unit timeout that is not shorter than the batch timeout', () => {
        config.worker_pool.unit_timeout_ms = 2000;
        config.worker_pool.batch_timeout_ms = 2000;

        const result = validator.validate(config);

        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['worker_pool.batch_timeout_ms (2000) must exceed unit_timeout_ms (2000)']);
      });

      it('should check the cheap-task timeouts too', () => {
        config.cheap_task.unit_timeout_ms = 6000;

        const result = validator.validate(config);

        expect(result.errors).toEqual(['cheap_task.batch_timeout_ms (5000) must exceed unit_timeout_ms (6000)']);
      });
    });

    describe('clients', () => {
      it('should reject an error rate outside [0, 1]', () => {
        config.clients.primary.error_rate = 1.5;

        const result = validator.validate(config);

        expect(result.errors).toEqual(['clients.primary.error_rate must be between 0 and 1']);
      });

      it('should reject a non-positive pool size', () => {
        config.clients.secondary.pool_size = 0;

        expect(validator.validate(config).errors).toEqual(['clients.secondary.pool_size must be a positive integer']);
      });

      it('should reject two clients with the same name', () => {
        config.clients.secondary.name = 'primary';

        expect(validator.validate(config).errors).toEqual(["Client names must differ (both are 'primary')"]);
      });
    });

    describe('worker pool', () => {
      it('should reject min_workers above max_workers', () => {
        config.worker_pool.min_workers = 10;
        config.worker_pool.max_workers = 4;

        expect(validator.validate(config).errors).toEqual(['worker_pool.min_workers (10) exceeds max_workers (4)']);
      });

      it('should warn about the abort rejection policy', () => {
        config.worker_pool.rejection_policy = 'abort';

        const result = validator.validate(config);

        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['worker_pool.rejection_policy "abort" turns saturation into failed units']);
      });
    });

    describe('load profiles', () => {
      it('should reject a profile without users', () => {
        config.load.profiles.light.users = 0;

        expect(validator.validate(config).errors).toEqual(['load.profiles.light.users must be a positive integer']);
      });

      it('should reject a negative ramp-up', () => {
        config.load.profiles.medium.ramp_up = -1;

        expect(validator.validate(config).errors).toEqual(['load.profiles.medium.ramp_up must not be negative']);
      });

      it('should warn about high user counts', () => {
        config.load.profiles.heavy.users = 2000;

        const result = validator.validate(config);

        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(["High virtual user count (2000) in profile 'heavy'"]);
      });

      it('should warn when ramp-up is not shorter than the duration', () => {
        config.load.profiles = { smoke: { users: 2, duration: 5, ramp_up: 5 } };

        expect(validator.validate(config).warnings).toEqual([
          'load.profiles.smoke.ramp_up (5s) is not shorter than its duration (5s); late users may never start'
        ]);
      });

      it('should require at least one profile', () => {
        config.load.profiles = {};

        expect(validator.validate(config).errors).toEqual(['At least one load profile must be configured']);
      });
    });

    describe('benchmark', () => {
      it('should reject zero iterations and a fractional unit count', () => {
        config.benchmark.iterations = 0;
        config.benchmark.units = 10.5;

        expect(validator.validate(config).errors).toEqual([
          'benchmark.units must be a positive integer',
          'benchmark.iterations must be a positive integer'
        ]);
      });
    });

    it('should reject a fractional seed', () => {
      config.seed = 1.5;

      expect(validator.validate(config).errors).toEqual(['seed must be an integer']);
    });
  });
});
