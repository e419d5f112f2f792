#!/usr/bin/env node

import { Command } from 'commander';
import { envCommand } from './commands/env';
import { benchmarkCommand } from './commands/benchmark';
import { loadCommand } from './commands/load';
import { validateCommand } from './commands/validate';
import { cleanupCommand } from './commands/cleanup';
import { errorMessage, logger } from '../utils/logger';

const program = new Command();

program
    .name('fanout-bench')
    .description('Compare worker-pool and cheap-task scheduling for fan-out I/O workloads')
    .version('1.0.0');

program
    .command('env')
    .description('Print runtime, processor and memory information')
    .action(envCommand);

program
    .command('benchmark')
    .description('Run the single-shot comparative benchmark')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment overlay')
    .option('-o, --output <directory>', 'Output directory for results')
    .option('--seed <number>', 'Seed for generated mock data')
    .option('--strict', 'Fail batches with partial results instead of returning an empty batch')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(benchmarkCommand);

program
    .command('load')
    .description('Run ramped multi-user load profiles against both strategies')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment overlay')
    .option('-p, --profile <names>', 'Comma-separated load profiles to run (default: all)')
    .option('-o, --output <directory>', 'Output directory for results')
    .option('--seed <number>', 'Seed for generated mock data')
    .option('--strict', 'Fail batches with partial results instead of returning an empty batch')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(loadCommand);

program
    .command('validate')
    .description('Validate a configuration file')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment overlay')
    .action(validateCommand);

program
    .command('cleanup')
    .description('Remove the log, results and tmp directories')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-e, --env <environment>', 'Environment overlay')
    .action(cleanupCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`❌ ${errorMessage(error)}`);
    process.exit(1);
});
