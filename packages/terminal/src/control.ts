/**
 * Terminal Control
 *
 * The four line-discipline operations the injector needs. LibcTerminalControl
 * performs them with ioctl on the controlling terminal. Tests provide a mock.
 */

import koffi from "koffi";
import { getSystemErrorName } from "node:util";
import { clearEchoFlag, type PlatformTable } from "./platform.js";

/** The two libc entry points LibcTerminalControl calls */
export interface LibcBinding {
  /** ioctl(fd, request, arg); returns the C return code */
  ioctl(fd: number, request: number, arg: Buffer): number;
  /** errno left by the last failing call */
  errno(): number;
}

export function loadLibc(path: string): LibcBinding {
  const lib = koffi.load(path);
  const ioctl = lib.func("ioctl", "int", ["int", "unsigned long", "..."]);
  return {
    ioctl: (fd, request, arg) => Number(ioctl(fd, request, "void *", arg)),
    errno: () => koffi.errno(),
  };
}

/** Raw settings struct as read from the terminal. Opaque to callers. */
export type TerminalSnapshot = Buffer;

/**
 * Minimal capability interface used by TerminalInjector.
 * Every operation throws on failure.
 */
export interface TerminalControl {
  getSettings(): TerminalSnapshot;
  setSettings(settings: TerminalSnapshot): void;
  withEchoDisabled(settings: TerminalSnapshot): TerminalSnapshot;
  /** Queue one character as if typed at the keyboard */
  injectChar(char: string): void;
}

export class IoctlError extends Error {
  readonly errno: number;
  readonly code: string;

  constructor(operation: string, errno: number) {
    const code = errnoName(errno);
    super(`${operation} failed: ${code}`);
    this.name = "IoctlError";
    this.errno = errno;
    this.code = code;
  }
}

export class LibcTerminalControl implements TerminalControl {
  private table: PlatformTable;
  private fd: number;
  private libc: LibcBinding;

  constructor(table: PlatformTable, fd: number = 0, libc: LibcBinding = loadLibc(table.libc)) {
    this.table = table;
    this.fd = fd;
    this.libc = libc;
  }

  getSettings(): TerminalSnapshot {
    const settings = Buffer.alloc(this.table.settingsSize);
    this.call(this.table.getSettings, settings, "reading terminal settings");
    return settings;
  }

  setSettings(settings: TerminalSnapshot): void {
    this.call(this.table.setSettings, Buffer.from(settings), "writing terminal settings");
  }

  withEchoDisabled(settings: TerminalSnapshot): TerminalSnapshot {
    return clearEchoFlag(this.table, settings);
  }

  injectChar(char: string): void {
    // TIOCSTI queues a single byte; multi-byte characters go in byte by byte
    for (const byte of Buffer.from(char, "utf8")) {
      this.call(this.table.injectChar, Buffer.of(byte), "TIOCSTI");
    }
  }

  private call(request: number, arg: Buffer, operation: string): void {
    if (this.libc.ioctl(this.fd, request, arg) !== 0) {
      throw new IoctlError(operation, this.libc.errno());
    }
  }
}

function errnoName(errno: number): string {
  try {
    return getSystemErrorName(-errno);
  } catch {
    return `errno ${errno}`;
  }
}
