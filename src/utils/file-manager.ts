import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger';

/**
 * File management utility for run directories and result files
 */
export class FileManager {
  /**
   * Create the working directories a run writes into
   */
  static setupDirectories(directories: string[]): void {
    for (const dir of directories) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
        logger.debug(`📁 Created directory: ${dir}`);
      }
    }
  }

  /**
   * Remove working directories and everything in them
   */
  static cleanup(directories: string[]): void {
    for (const dir of directories) {
      fs.rmSync(dir, { recursive: true, force: true });
      logger.debug(`🧹 Removed directory: ${dir}`);
    }
  }

  /**
   * Ensure directory exists for a file path
   */
  static ensureDirectoryExists(filePath: string): void {
    const dir = path.dirname(filePath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.debug(`📁 Created directory: ${dir}`);
    }
  }

  /**
   * Generate unique filename if file already exists
   */
  static generateUniqueFileName(originalPath: string): string {
    if (!fs.existsSync(originalPath)) {
      return originalPath;
    }

    const dir = path.dirname(originalPath);
    const ext = path.extname(originalPath);
    const base = path.basename(originalPath, ext);

    let counter = 1;
    let candidate = path.join(dir, `${base}_${counter}${ext}`);
    while (fs.existsSync(candidate)) {
      counter++;
      candidate = path.join(dir, `${base}_${counter}${ext}`);
    }
    return candidate;
  }
}
