/**
 * Terminal Injector
 *
 * Pushes a command into the terminal's input queue as if it had been typed.
 * Echo is switched off while the characters go in so the shell's line editor
 * is the only thing that draws them; the original settings are put back
 * whatever happens after they were read.
 */

import {
  createCharInjectError,
  createPlatformUnsupportedError,
  createTerminalRestoreError,
  createTerminalUnavailableError,
  err,
  ok,
  type InjectError,
  type Result,
} from "@cmdfor/protocol";
import { LibcTerminalControl, type TerminalControl, type TerminalSnapshot } from "./control.js";
import { platformTable } from "./platform.js";

export class TerminalInjector {
  private control: TerminalControl;

  constructor(control: TerminalControl) {
    this.control = control;
  }

  inject(command: string): Result<void, InjectError> {
    let snapshot: TerminalSnapshot;
    try {
      snapshot = this.control.getSettings();
    } catch (cause) {
      return err(createTerminalUnavailableError(cause));
    }

    return this.withSettingsRestored(snapshot, () => {
      try {
        this.control.setSettings(this.control.withEchoDisabled(snapshot));
      } catch (cause) {
        return createTerminalUnavailableError(cause);
      }

      // for..of walks code points, so surrogate pairs stay together
      for (const char of command) {
        try {
          this.control.injectChar(char);
        } catch (cause) {
          return createCharInjectError(char, cause);
        }
      }
      return undefined;
    });
  }

  /**
   * Runs `body` and then writes `snapshot` back exactly once. A failure from
   * `body` takes precedence over a failed restore, which is attached to it.
   */
  private withSettingsRestored(
    snapshot: TerminalSnapshot,
    body: () => InjectError | undefined,
  ): Result<void, InjectError> {
    let failure: InjectError | undefined;
    try {
      failure = body();
    } catch (cause) {
      failure = createTerminalUnavailableError(cause);
    }

    let restoreFailure: unknown;
    let restored = true;
    try {
      this.control.setSettings(snapshot);
    } catch (cause) {
      restored = false;
      restoreFailure = cause;
    }

    if (failure) {
      if (!restored && (failure.code === "INJECT" || failure.code === "TERMINAL_UNAVAILABLE")) {
        return err({ ...failure, restoreFailure });
      }
      return err(failure);
    }
    if (!restored) return err(createTerminalRestoreError(restoreFailure));
    return ok(undefined);
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface TerminalInjectorOptions {
  platform: string;
  stdin: { isTTY?: boolean; fd?: number };
  /** Override for tests; defaults to the libc binding for the platform */
  createControl?: (fd: number) => TerminalControl;
}

export function createTerminalInjector(
  options: TerminalInjectorOptions,
): Result<TerminalInjector, InjectError> {
  if (!options.stdin.isTTY) {
    return err(createTerminalUnavailableError(new Error("stdin is not a terminal")));
  }

  const table = platformTable(options.platform);
  if (!table) return err(createPlatformUnsupportedError(options.platform));

  const fd = options.stdin.fd ?? 0;
  try {
    const control = options.createControl ? options.createControl(fd) : new LibcTerminalControl(table, fd);
    return ok(new TerminalInjector(control));
  } catch (cause) {
    return err(createTerminalUnavailableError(cause));
  }
}
