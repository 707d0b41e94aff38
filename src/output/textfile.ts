/**
 * Textfile output — mirrors the registry into a node_exporter textfile
 * collector directory.
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { createLogger, type Logger } from '../core/logger.js';

export const TEXTFILE_NAME = 'webhook_metrics.prom';

/**
 * Write `content` to a temporary file beside `filePath`, then rename it over
 * `filePath`. Readers never observe a partial file.
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  logger: Logger = createLogger('atomicWrite'),
): Promise<void> {
  const tmpPath = join(dirname(filePath), `.tmp-${randomBytes(6).toString('hex')}`);
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch((cleanupError: unknown) => {
      if (isEnoent(cleanupError)) return;
      logger.warn('Temporary file cleanup failed', {
        path: tmpPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw new Error(
      `Atomic write failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function isEnoent(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serialises textfile writes: each `schedule()` renders once the previous
 * write has settled, so the last write always reflects the latest state.
 */
export class TextfileWriter {
  readonly path: string;
  private pending: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    directory: string,
    private readonly render: () => Promise<string>,
    logger?: Logger,
  ) {
    this.path = join(directory, TEXTFILE_NAME);
    this.logger = logger ?? createLogger('TextfileWriter');
  }

  /** Queue a write. Failures are logged, never rejected. */
  schedule(): Promise<void> {
    this.pending = this.pending.then(() => this.write());
    return this.pending;
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private async write(): Promise<void> {
    try {
      await atomicWrite(this.path, await this.render(), this.logger);
      this.logger.debug('Textfile written', { path: this.path });
    } catch (error) {
      this.logger.error('Textfile write failed', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
