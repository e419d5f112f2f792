import { ConfigParser } from '../../config/parser';
import { ConfigValidator } from '../../config/validator';
import { ConfigurationError } from '../../core/errors';
import { errorMessage, logger, LogLevel } from '../../utils/logger';

export async function validateCommand(options: { config?: string; env?: string }): Promise<void> {
  logger.setLevel(LogLevel.INFO);

  try {
    logger.info(`🔍 Validating configuration: ${options.config ?? '(defaults)'}`);

    const parser = new ConfigParser();
    const config = await parser.parse(options.config, options.env);

    const validator = new ConfigValidator();
    const result = validator.validate(config);

    if (result.valid) {
      logger.success('✅ Configuration is valid');
    } else {
      logger.error('❌ Configuration validation failed:');
      result.errors.forEach(error => logger.error(`  - ${error}`));
    }

    if (result.warnings.length > 0) {
      logger.warn('⚠️  Warnings:');
      result.warnings.forEach(warning => logger.warn(`  - ${warning}`));
    }

    if (!result.valid) {
      process.exit(1);
    }
  } catch (error) {
    logger.error(`❌ Validation failed: ${errorMessage(error)}`);
    if (error instanceof ConfigurationError) {
      error.details.forEach(detail => logger.error(`  - ${detail}`));
    }
    process.exit(1);
  }
}
