/**
 * Platform tables
 *
 * ioctl request numbers and the termios layout differ per OS family.
 * Only the families listed here are supported; everything else fails
 * closed instead of guessing numbers.
 */

export interface PlatformTable {
  /** Shared library that exports ioctl */
  libc: string;
  /** Read line-discipline settings (TCGETS / TIOCGETA) */
  getSettings: number;
  /** Write line-discipline settings (TCSETS / TIOCSETA) */
  setSettings: number;
  /** Push one byte into the input queue (TIOCSTI) */
  injectChar: number;
  /** Size of the settings struct the get/set requests read and write */
  settingsSize: number;
  /** Byte offset of c_lflag inside the struct */
  lflagOffset: number;
  /** Width of tcflag_t in bytes */
  lflagWidth: 4 | 8;
  /** ECHO bit in c_lflag */
  echoFlag: number;
}

export const PLATFORM_TABLES: Readonly<Record<string, PlatformTable>> = {
  linux: {
    libc: "libc.so.6",
    getSettings: 0x5401,
    setSettings: 0x5402,
    injectChar: 0x5412,
    // glibc struct termios; the kernel's is a 36-byte prefix of it
    settingsSize: 60,
    lflagOffset: 12,
    lflagWidth: 4,
    echoFlag: 0o10,
  },
  darwin: {
    libc: "/usr/lib/libSystem.B.dylib",
    getSettings: 0x40487413,
    setSettings: 0x80487414,
    injectChar: 0x80017472,
    settingsSize: 72,
    lflagOffset: 24,
    lflagWidth: 8,
    echoFlag: 0x8,
  },
};

export function platformTable(platform: string): PlatformTable | undefined {
  return Object.hasOwn(PLATFORM_TABLES, platform) ? PLATFORM_TABLES[platform] : undefined;
}

/**
 * Copy of `settings` with ECHO cleared in c_lflag.
 */
export function clearEchoFlag(table: PlatformTable, settings: Buffer): Buffer {
  const next = Buffer.from(settings);
  if (table.lflagWidth === 4) {
    const lflag = next.readUInt32LE(table.lflagOffset);
    next.writeUInt32LE((lflag & ~table.echoFlag) >>> 0, table.lflagOffset);
  } else {
    const lflag = next.readBigUInt64LE(table.lflagOffset);
    next.writeBigUInt64LE(lflag & ~BigInt(table.echoFlag), table.lflagOffset);
  }
  return next;
}
