import chalk from 'chalk';
import { CommonOptions, createImplementations, failSetup, installInterruptHandler, prepareRun, shutdownAll } from './setup';
import { BenchConfig, LoadProfile } from '../../config/types';
import { ConfigurationError } from '../../core/errors';
import { describeRuntime } from '../../core/environment';
import { compareImplementations, LoadComparison, LoadGenerator, LoadTestReport, ProgressEvent } from '../../core/load-generator';
import { MetricsCollector } from '../../metrics/collector';
import { MetricsStatistics } from '../../metrics/types';
import { ReportSections } from '../../outputs/base';
import { JSONResultWriter } from '../../outputs/json';

export interface LoadCommandOptions extends CommonOptions {
  profile?: string;
  strict?: boolean;
}

export async function loadCommand(options: LoadCommandOptions): Promise<void> {
  let config: BenchConfig;
  let profiles: Record<string, LoadProfile>;
  try {
    config = await prepareRun(options);
    profiles = selectProfiles(config, options.profile);
  } catch (error) {
    failSetup(error, options.verbose);
  }
  installInterruptHandler(config);

  const metrics = new MetricsCollector();
  const implementations = createImplementations(config, metrics, options.strict);
  const [baseline, candidate] = implementations;

  try {
    printConfiguration(profiles);

    const generator = new LoadGenerator({
      profiles,
      implementations,
      load: config.load,
      metrics
    });
    generator.on('progress', (event: ProgressEvent) => {
      process.stdout.write(
        `\r${event.implementation} | Requests: ${event.requests} | Throughput: ${event.throughput.toFixed(2)} req/s | ` +
        `Errors: ${event.error_rate.toFixed(2)}% | Time remaining: ${event.remaining_seconds}s   `
      );
    });

    const report = await generator.run();
    process.stdout.write('\n');

    const comparison = compareImplementations(report, baseline.name, candidate.name);
    printFinalComparison(report, comparison, candidate.name, baseline.name);

    const writer = new JSONResultWriter(config.output.results_dir);
    const filePath = await writer.write('load_test', loadReportSections(
      {
        ...describeRuntime(),
        profiles,
        units_per_user: config.load.units_per_user,
        think_time_max_ms: config.load.think_time_max_ms
      },
      report,
      comparison,
      metrics.statistics()
    ));
    console.log(`\nDetailed results saved to: ${filePath}`);
  } finally {
    await shutdownAll(implementations);
  }
}

export interface LoadAnalysis {
  comparison: LoadComparison;
  metrics: MetricsStatistics;
}

/**
 * `results` stays the profile → implementation map, whatever the profiles are called
 */
export function loadReportSections<C>(
  configuration: C,
  report: LoadTestReport,
  comparison: LoadComparison,
  statistics: MetricsStatistics
): ReportSections<C, LoadTestReport, LoadAnalysis> {
  return {
    configuration,
    results: report,
    analysis: { comparison, metrics: statistics }
  };
}

/**
 * Comma-separated profile names; every configured profile when omitted
 */
export function selectProfiles(config: BenchConfig, names?: string): Record<string, LoadProfile> {
  if (!names) return { ...config.load.profiles };

  const selected: Record<string, LoadProfile> = {};
  for (const name of names.split(',').map(entry => entry.trim()).filter(entry => entry !== '')) {
    const profile = config.load.profiles[name];
    if (!profile) {
      throw new ConfigurationError(`Unknown load profile '${name}'. Available: ${Object.keys(config.load.profiles).join(', ')}`);
    }
    selected[name] = profile;
  }
  return selected;
}

function printConfiguration(profiles: Record<string, LoadProfile>): void {
  const runtime = describeRuntime();
  console.log(chalk.bold('\nLoad Test Configuration:'));
  console.log(`- Node version: ${runtime.node_version}`);
  console.log(`- Available processors: ${runtime.processors}`);
  console.log(`- Max memory: ${runtime.max_memory}MB`);
  console.log('\nLoad Profiles:');
  for (const [name, profile] of Object.entries(profiles)) {
    console.log(`  ${name}:`);
    console.log(`    - Concurrent users: ${profile.users}`);
    console.log(`    - Duration: ${profile.duration}s`);
    console.log(`    - Ramp-up time: ${profile.ramp_up}s`);
  }
  console.log('');
}

function printFinalComparison(
  report: LoadTestReport,
  comparison: LoadComparison,
  candidate: string,
  baseline: string
): void {
  console.log(chalk.bold('\nFinal Comparison:'));
  console.log('=================');

  for (const profileName of Object.keys(report)) {
    console.log(`\n${profileName} profile (${candidate} vs ${baseline}):`);
    const entry = comparison[profileName];
    if (!entry) {
      console.log(chalk.yellow('  Not enough successful requests to compare'));
      continue;
    }
    console.log(`  Throughput improvement: ${entry.throughput_improvement}%`);
    console.log(`  Average latency improvement: ${entry.latency_improvement}%`);
    console.log(`  Error rate difference: ${entry.error_rate_difference}%`);
  }
}
