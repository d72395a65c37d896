import { LineSink } from '../../src/types';

/**
 * Collects activity-log lines in memory
 */
export class MemorySink implements LineSink {
  readonly lines: string[] = [];

  async append(lines: string[]): Promise<void> {
    this.lines.push(...lines);
  }
}
