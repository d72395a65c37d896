import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { LineSink } from '../types';
import { logger } from '../utils/logger';

/**
 * Append-only, human-readable log file written by the scheduled tasks.
 * A failed write is reported through the structured logger and does not
 * fail the task.
 */
export class ActivityLog implements LineSink {
  constructor(public readonly path: string) {}

  async append(lines: string[]): Promise<void> {
    if (lines.length === 0) {
      return;
    }

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, lines.map((line) => `${line}\n`).join(''), 'utf8');
    } catch (error) {
      logger.error('Failed to write activity log', error, {
        path: this.path,
        lines,
      });
    }
  }
}
