/**
 * Configuration from environment variables.
 *
 *   CMDFOR_OPENAI_MODEL   model id (default gpt-4o)
 *   CMDFOR_DEBUG          1/true to print error details
 *   XDG_DATA_HOME         base directory of the cost ledger
 *   LOCALAPPDATA          same, on Windows
 */

import { posix, win32 } from "node:path";
import { DEFAULT_MODEL, type Env } from "@cmdfor/completion";

export interface CliConfig {
  model: string;
  debug: boolean;
  ledgerPath: string;
}

export function loadConfig(env: Env, platform: string, home: string): CliConfig {
  return {
    model: env.CMDFOR_OPENAI_MODEL || DEFAULT_MODEL,
    debug: isTruthy(env.CMDFOR_DEBUG),
    ledgerPath: ledgerPath(env, platform, home),
  };
}

function ledgerPath(env: Env, platform: string, home: string): string {
  if (platform === "win32" && env.LOCALAPPDATA) {
    return win32.join(env.LOCALAPPDATA, "cmdfor", "cost.json");
  }
  const base = env.XDG_DATA_HOME || posix.join(home, ".local", "share");
  return posix.join(base, "cmdfor", "cost.json");
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}
