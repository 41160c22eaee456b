import { promises as fs } from 'fs';
import path from 'path';
import { IPageStore } from '../interfaces/IPageStore';
import { FileNameUtils } from '../utils/FileNameUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { describeError } from '../../../utils/errors';

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  typeof error === 'object' && error !== null && 'code' in error;

/**
 * Saves rendered pages under a site's output directory, mirroring the
 * navigation tree through `<parent title>_links` folders
 */
export class FilePageStore implements IPageStore {
  readonly supportsContentComparison = true;
  private readonly logger = LoggingUtils.createTaggedLogger('page-store');

  constructor(private readonly baseDir: string) {}

  /**
   * @returns Path of the written file; an existing file is never overwritten,
   * the name gets a `_1`, `_2` ... suffix instead
   */
  async save(content: string, suggestedName: string, directory: string[]): Promise<string> {
    const dir = path.join(this.baseDir, ...directory);
    await fs.mkdir(dir, { recursive: true });

    const fileName = FileNameUtils.fileName(suggestedName);
    const extension = path.extname(fileName);
    const stem = fileName.slice(0, fileName.length - extension.length);

    for (let counter = 0; ; counter++) {
      const candidate = path.join(dir, counter === 0 ? fileName : `${stem}_${counter}${extension}`);
      try {
        await fs.writeFile(candidate, content, { encoding: 'utf8', flag: 'wx' });
        this.logger.debug(`Saved ${candidate}`);
        return candidate;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }
    }
  }

  async read(savedPath: string): Promise<string | null> {
    try {
      return await fs.readFile(savedPath, 'utf8');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        this.logger.warn(`Could not read saved page ${savedPath}: ${describeError(error)}`);
      }
      return null;
    }
  }
}
