import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import type { IAbortSignal } from '../interfaces/abort-signal.interface';
import { errorMessage, hasErrorCode } from '../utils/error-utils';

/**
 * Abort signal backed by a marker file so that processes which share no
 * memory with the executor (an agent invoking a tool, a shell hook) can
 * request cancellation. The file's presence is the signal; its content is the
 * reason.
 */
export class FileAbortSignal implements IAbortSignal {
  private readonly logger = new Logger(FileAbortSignal.name);

  constructor(readonly markerPath: string) {}

  static forProject(projectRoot: string, relativePath: string): FileAbortSignal {
    return new FileAbortSignal(path.resolve(projectRoot, relativePath));
  }

  async raise(reason: string): Promise<void> {
    await mkdir(path.dirname(this.markerPath), { recursive: true });
    await writeFile(this.markerPath, reason, 'utf-8');
    this.logger.log(`Abort requested: ${reason}`);
  }

  async isRaised(): Promise<string | null> {
    try {
      return await readFile(this.markerPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async clear(): Promise<boolean> {
    try {
      await unlink(this.markerPath);
      this.logger.debug(`Cleaned up existing abort file ${this.markerPath}`);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      this.logger.warn(
        `Failed to clean up abort file ${this.markerPath}: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}
