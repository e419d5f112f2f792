import chalk from 'chalk';
import { CommonOptions, createImplementations, failSetup, installInterruptHandler, prepareRun, shutdownAll } from './setup';
import { BenchConfig } from '../../config/types';
import { BenchmarkReport, BenchmarkRunner, summarizeBenchmark } from '../../core/benchmark-runner';
import { describeRuntime } from '../../core/environment';
import { MetricsCollector } from '../../metrics/collector';
import { JSONResultWriter } from '../../outputs/json';
import { TimestampHelper } from '../../utils/timestamp-helper';

export interface BenchmarkCommandOptions extends CommonOptions {
  strict?: boolean;
}

export async function benchmarkCommand(options: BenchmarkCommandOptions): Promise<void> {
  let config: BenchConfig;
  try {
    config = await prepareRun(options);
  } catch (error) {
    failSetup(error, options.verbose);
  }
  installInterruptHandler(config);

  const metrics = new MetricsCollector();
  const implementations = createImplementations(config, metrics, options.strict);

  try {
    printConfiguration(config);

    const runner = new BenchmarkRunner({
      implementations,
      config: config.benchmark,
      metrics,
      onIteration: (name, iteration, stats) => {
        const line = stats.duration_ms < 0
          ? chalk.red('failed')
          : `${stats.duration_ms.toFixed(2)}ms (Memory: ${(stats.memory_bytes / 1024 / 1024).toFixed(2)}MB, GC: ${stats.gc_count})`;
        console.log(`  ${name} run ${iteration}/${config.benchmark.iterations}: ${line}`);
      }
    });

    const report = await runner.run();
    printResults(report);

    const writer = new JSONResultWriter(config.output.results_dir);
    const filePath = await writer.write('benchmark', {
      configuration: {
        timestamp: TimestampHelper.now(),
        ...describeRuntime(),
        units: report.units,
        iterations: report.iterations,
        substrates: implementations.map(implementation => implementation.substrateName)
      },
      results: report.results,
      analysis: {
        comparison: report.comparison,
        metrics: metrics.statistics()
      }
    });
    console.log(`\nDetailed results saved to: ${filePath}`);
  } finally {
    await shutdownAll(implementations);
  }
}

function printConfiguration(config: BenchConfig): void {
  const runtime = describeRuntime();
  console.log(chalk.bold('\nBenchmark Configuration:'));
  console.log(`- Test data size: ${config.benchmark.units} units`);
  console.log(`- Iterations: ${config.benchmark.iterations}`);
  console.log(`- Node version: ${runtime.node_version}`);
  console.log(`- Available processors: ${runtime.processors}`);
  console.log(`- Max memory: ${runtime.max_memory}MB\n`);
}

function printResults(report: BenchmarkReport): void {
  console.log(chalk.bold('\nBenchmark Results:'));
  console.log('==================');

  for (const [name, result] of Object.entries(report.results)) {
    console.log(`\n${name}:`);
    if (!result.warmup.ok) {
      console.log(chalk.yellow(`  Warm-up failed: ${result.warmup.error}`));
    }

    const summary = summarizeBenchmark(result);
    if (!summary) {
      console.log(chalk.red('  All runs failed'));
      continue;
    }
    console.log('  Duration:');
    console.log(`    Average: ${summary.average}ms`);
    console.log(`    Min: ${summary.min}ms`);
    console.log(`    Max: ${summary.max}ms`);
    console.log('  Memory:');
    console.log(`    Average: ${summary.average_memory_mb}MB`);
    console.log(`  GC runs: ${summary.gc_runs}`);
  }

  const comparison = report.comparison;
  if (comparison) {
    console.log(chalk.bold('\nPerformance Comparison:'));
    console.log('======================');
    console.log(`${comparison.candidate} vs ${comparison.baseline}:`);
    console.log(`  Speed improvement: ${comparison.speed_improvement}%`);
    console.log(`  Memory difference: ${comparison.memory_difference_mb}MB`);
    console.log(`  GC runs difference: ${comparison.gc_difference}`);
  }
}
