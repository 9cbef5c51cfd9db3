/**
 * Config Writer
 * Persists a JSON document atomically: temp file in the target directory, then rename
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from '../logger';
import { PersistenceError, describeError } from '../errors';

export class ConfigWriter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Replace `filePath` with the serialized document. The previous file stays
   * intact unless the rename succeeds.
   */
  async write(filePath: string, document: unknown): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    const serialized = `${JSON.stringify(document, null, 2)}\n`;

    try {
      await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.writeFile(tempPath, serialized, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new PersistenceError(filePath, `Failed to write ${filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.logger.debug('Wrote file', { path: filePath, bytes: Buffer.byteLength(serialized, 'utf-8') });
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      this.logger.warn('Failed to remove temporary file', { path: tempPath, error: describeError(error) });
    }
  }
}
