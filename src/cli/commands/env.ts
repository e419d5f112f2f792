import chalk from 'chalk';
import { inspectEnvironment } from '../../core/environment';
import { processorCount } from '../../config/defaults';

export async function envCommand(): Promise<void> {
  const info = inspectEnvironment();

  console.log(chalk.bold('Node Environment:'));
  console.log(`  Version: ${info.node_version}`);
  console.log(`  V8: ${info.v8_version}`);
  console.log(`  Platform: ${info.platform} (${info.arch})`);
  console.log(`  NODE_OPTIONS: ${info.node_options}`);

  console.log(chalk.bold('\nAvailable Processors:'));
  console.log(`  Count: ${info.processors}`);
  console.log(`  Default max workers: ${processorCount() * 2}`);
  console.log(`  Cheap-task scheduling: ${info.cheap_task_supported ? chalk.green('supported') : chalk.yellow('unavailable (worker-pool fallback)')}`);

  console.log(chalk.bold('\nMemory Info:'));
  console.log(`  Heap limit: ${info.memory.heap_limit_mb}MB`);
  console.log(`  Heap used: ${info.memory.heap_used_mb}MB`);
  console.log(`  RSS: ${info.memory.rss_mb}MB`);
  console.log(`  System total: ${info.memory.total_mb}MB`);
  console.log(`  System free: ${info.memory.free_mb}MB`);
}
