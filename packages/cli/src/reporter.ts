/**
 * User-facing messages. Everything goes to stderr so stdout stays free for
 * the Ink frames.
 */

export interface Reporter {
  error(message: string): void;
  warn(message: string): void;
  /** Dropped unless debug output is on */
  debug(message: string): void;
}

export class StderrReporter implements Reporter {
  private out: { write(chunk: string): unknown };
  private debugEnabled: boolean;

  constructor(out: { write(chunk: string): unknown }, debugEnabled: boolean) {
    this.out = out;
    this.debugEnabled = debugEnabled;
  }

  error(message: string): void {
    this.out.write(`✗ ${message}\n`);
  }

  warn(message: string): void {
    this.out.write(`⚠ ${message}\n`);
  }

  debug(message: string): void {
    if (this.debugEnabled) this.out.write(`[debug] ${message}\n`);
  }
}
