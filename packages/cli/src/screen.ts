/**
 * Cursor bookmarks so a rerun can wipe everything drawn since the last mark.
 */

const SAVE_CURSOR = "\x1b[s";
const RESTORE_AND_CLEAR = "\x1b[u\x1b[J";

export interface Screen {
  mark(): void;
  clear(): void;
}

export class AnsiScreen implements Screen {
  private out: { write(chunk: string): unknown };

  constructor(out: { write(chunk: string): unknown }) {
    this.out = out;
  }

  mark(): void {
    this.out.write(SAVE_CURSOR);
  }

  /** Back to the last mark, erasing below it */
  clear(): void {
    this.out.write(RESTORE_AND_CLEAR);
  }
}
