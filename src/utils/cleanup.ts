import { mkdir, readdir, rm, stat, unlink } from 'fs/promises';
import { join } from 'path';
import type { DownloadedFile } from '../types/index.js';
import { logger } from './logger.js';

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Deletes a downloaded file. A file that is already gone counts as deleted.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
    logger.debug(`Deleted ${filePath}`);
  } catch (error) {
    if (!isMissing(error)) {
      logger.warn(`Failed to delete ${filePath}`, { error });
    }
  }
}

/**
 * Deletes every entry in `dir` whose name starts with `prefix`
 */
export async function removeByPrefix(dir: string, prefix: string): Promise<string[]> {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch (error) {
    if (!isMissing(error)) {
      logger.warn(`Failed to list ${dir}`, { error });
    }
    return [];
  }

  const matching = files.filter((file) => file.startsWith(prefix));
  await Promise.all(matching.map((file) => removeFile(join(dir, file))));
  return matching;
}

/**
 * Runs `use` with a freshly downloaded file and deletes the file afterwards,
 * whether `use` resolved or threw.
 */
export async function withDownloadedFile<T>(
  acquire: () => Promise<DownloadedFile>,
  use: (file: DownloadedFile) => Promise<T>
): Promise<T> {
  const file = await acquire();
  try {
    return await use(file);
  } finally {
    await removeFile(file.path);
  }
}

export class Cleanup {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly dir: string,
    private readonly maxAge = 60 * 60 * 1000 // 1 hour
  ) {}

  /**
   * Ensures the download directory exists and is empty
   */
  public async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const files = await readdir(this.dir);
    await Promise.all(files.map((file) => rm(join(this.dir, file), { recursive: true, force: true })));
    logger.info(`Initialized download directory: ${this.dir}`);
  }

  /**
   * Removes files a crashed or interrupted download left behind
   */
  public async cleanOldFiles(now = Date.now()): Promise<string[]> {
    const removed: string[] = [];
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (error) {
      if (!isMissing(error)) {
        logger.error('Error listing download directory', error);
      }
      return removed;
    }

    for (const file of files) {
      const filePath = join(this.dir, file);
      try {
        const stats = await stat(filePath);

        if (now - stats.mtimeMs > this.maxAge) {
          await rm(filePath, { recursive: true, force: true });
          removed.push(file);
          logger.info(`Removed stale file: ${file}`);
        }
      } catch (error) {
        // a handler may have deleted it since readdir
        if (!isMissing(error)) {
          logger.error(`Error cleaning up ${file}`, error);
        }
      }
    }
    return removed;
  }

  public startPeriodicCleanup(interval = 15 * 60 * 1000): void {
    this.stop();
    this.timer = setInterval(() => {
      void this.cleanOldFiles();
    }, interval);
    this.timer.unref();
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
