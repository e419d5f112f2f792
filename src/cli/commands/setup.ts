import { ConfigParser } from '../../config/parser';
import { ConfigValidator } from '../../config/validator';
import { BenchConfig } from '../../config/types';
import { ConfigurationError } from '../../core/errors';
import { FanoutImplementation } from '../../core/implementation';
import { MetricsCollector } from '../../metrics/collector';
import { FileManager } from '../../utils/file-manager';
import { fakerManager } from '../../utils/faker-manager';
import { errorMessage, logger, LogLevel, parseLogLevel } from '../../utils/logger';

export interface CommonOptions {
  config?: string;
  env?: string;
  output?: string;
  seed?: string;
  verbose?: boolean;
}

/**
 * Parse, validate and apply the configuration, then create the working directories.
 * Throws ConfigurationError for anything that should end the process with exit code 1.
 */
export async function prepareRun(options: CommonOptions): Promise<BenchConfig> {
  const parser = new ConfigParser();
  const config = await parser.parse(options.config, options.env);

  if (options.output) {
    config.output.results_dir = options.output;
  }
  if (options.seed !== undefined) {
    const seed = Number(options.seed);
    if (!Number.isInteger(seed)) {
      throw new ConfigurationError(`Invalid seed: ${options.seed}`);
    }
    config.seed = seed;
  }

  logger.setLevel(options.verbose ? LogLevel.DEBUG : parseLogLevel(config.log_level));

  const validation = new ConfigValidator().validate(config);
  validation.warnings.forEach(warning => logger.warn(`  - ${warning}`));
  if (!validation.valid) {
    throw new ConfigurationError('Configuration validation failed', validation.errors);
  }

  fakerManager.setSeed(config.seed);

  try {
    FileManager.setupDirectories([config.output.log_dir, config.output.results_dir, config.output.tmp_dir]);
  } catch (error) {
    throw new ConfigurationError(`Failed to create working directories: ${errorMessage(error)}`);
  }

  return config;
}

export function failSetup(error: unknown, verbose?: boolean): never {
  logger.error(`❌ Setup failed: ${errorMessage(error)}`);
  if (error instanceof ConfigurationError) {
    error.details.forEach(detail => logger.error(`  - ${detail}`));
  }
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}

/**
 * Both strategies, baseline first
 */
export function createImplementations(
  config: BenchConfig,
  metrics: MetricsCollector,
  strict?: boolean
): [FanoutImplementation, FanoutImplementation] {
  return [
    new FanoutImplementation({ policy: 'worker-pool', config, metrics, strict }),
    new FanoutImplementation({ policy: 'cheap-task', config, metrics, strict })
  ];
}

export async function shutdownAll(implementations: readonly FanoutImplementation[]): Promise<void> {
  await Promise.all(implementations.map(implementation => implementation.shutdown()));
}

/**
 * Interrupts remove the scratch directory and exit with code 1
 */
export function installInterruptHandler(config: BenchConfig): void {
  process.once('SIGINT', () => {
    logger.warn('Received SIGINT, cleaning up...');
    FileManager.cleanup([config.output.tmp_dir]);
    process.exit(1);
  });
}
