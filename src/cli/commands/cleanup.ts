import { ConfigParser } from '../../config/parser';
import { FileManager } from '../../utils/file-manager';
import { errorMessage, logger } from '../../utils/logger';

export async function cleanupCommand(options: { config?: string; env?: string }): Promise<void> {
  try {
    const config = await new ConfigParser().parse(options.config, options.env);
    const directories = [config.output.log_dir, config.output.results_dir, config.output.tmp_dir];
    FileManager.cleanup(directories);
    logger.success(`🧹 Removed ${directories.join(', ')}`);
  } catch (error) {
    logger.error(`❌ Cleanup failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
