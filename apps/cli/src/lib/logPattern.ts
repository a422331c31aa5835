import type { Level } from 'pino';
import { getLogger } from './logger';

/**
 * Logs every line it receives and remembers the first capture group of the
 * last line matching `pattern`.
 */
export class LogPatternWatcher {
  private captured: string | null = null;

  constructor(
    private readonly pattern: RegExp | null = null,
    private readonly level: Level = 'debug'
  ) {}

  readonly handleLine = (line: string): void => {
    getLogger()[this.level](line);
    if (!this.pattern) {
      return;
    }
    const match = this.pattern.exec(line);
    if (!match) {
      return;
    }
    const group = match.slice(1).find((value) => value !== undefined);
    if (group !== undefined) {
      this.captured = group;
    }
  };

  get artifact(): string | null {
    return this.captured;
  }
}
