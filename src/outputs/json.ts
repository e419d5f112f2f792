import * as fs from 'fs';
import * as path from 'path';
import { ReportSections, ResultDocument, ResultWriter } from './base';
import { FileManager } from '../utils/file-manager';
import { TimestampHelper } from '../utils/timestamp-helper';
import { logger } from '../utils/logger';

/**
 * Writes `<kind>_YYYYMMDD_HHMMSS.json` into the results directory; a second
 * report within the same second gets a `_1` suffix.
 */
export class JSONResultWriter implements ResultWriter {
  constructor(private readonly resultsDir: string) {}

  async write<C, R, A>(kind: string, sections: ReportSections<C, R, A>, now: Date = new Date()): Promise<string> {
    const filePath = FileManager.generateUniqueFileName(
      path.join(this.resultsDir, `${kind}_${TimestampHelper.getTimestamp('file', now)}.json`)
    );
    FileManager.ensureDirectoryExists(filePath);

    const document: ResultDocument<C, R, A> = {
      ...sections,
      timestamp: TimestampHelper.formatWithOffset(now)
    };

    await fs.promises.writeFile(filePath, JSON.stringify(document, null, 2));
    logger.debug(`📄 Results written: ${filePath}`);
    return filePath;
  }
}
