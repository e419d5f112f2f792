import { describe, it, expect } from 'vitest';
import { loadReportSections, selectProfiles } from '../../../src/cli/commands/load';
import { MetricsCollector } from '../../../src/metrics/collector';
import { LoadTestReport } from '../../../src/core/load-generator';
import { createDefaultConfig } from '../../../src/config/defaults';

describe('selectProfiles', () => {
  const config = createDefaultConfig();

  it('should run every configured profile by default', () => {
    expect(Object.keys(selectProfiles(config))).toEqual(['light', 'medium', 'heavy']);
  });

  it('should pick the named profiles in the order given', () => {
    expect(selectProfiles(config, 'heavy, light')).toEqual({
      heavy: { users: 100, duration: 120, ramp_up: 20 },
      light: { users: 10, duration: 30, ramp_up: 5 }
    });
  });

  it('should reject an unknown profile', () => {
    expect(() => selectProfiles(config, 'light,extreme')).toThrow(
      "Unknown load profile 'extreme'. Available: light, medium, heavy"
    );
  });
});

describe('loadReportSections', () => {
  it('should keep results as the profile map even for profiles named like analysis keys', () => {
    const report: LoadTestReport = {
      metrics: { WorkerPoolImplementation: null, CheapTaskImplementation: null },
      comparison: { WorkerPoolImplementation: null, CheapTaskImplementation: null }
    };
    const statistics = new MetricsCollector().statistics();

    const sections = loadReportSections({ units_per_user: 10 }, report, { metrics: null, comparison: null }, statistics);

    expect(sections.results).toBe(report);
    expect(Object.keys(sections.results)).toEqual(['metrics', 'comparison']);
    expect(sections.analysis).toEqual({
      comparison: { metrics: null, comparison: null },
      metrics: statistics
    });
    expect(sections.configuration).toEqual({ units_per_user: 10 });
  });
});
