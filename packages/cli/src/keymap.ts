/**
 * Key bindings for the command selector.
 */

import type { Key } from "ink";

export type SelectorKeyAction = "up" | "down" | "select" | "rerun" | "quit";

/** Subset of Ink's Key that the bindings look at */
export type KeyFlags = Pick<Key, "upArrow" | "downArrow" | "return" | "ctrl">;

export function resolveKey(input: string, key: KeyFlags): SelectorKeyAction | null {
  if (key.ctrl) return input === "c" ? "quit" : null;
  if (key.upArrow || input === "k") return "up";
  if (key.downArrow || input === "j") return "down";
  if (key.return || input === " ") return "select";
  if (input === "r") return "rerun";
  if (input === "q") return "quit";
  return null;
}

export const KEY_HELP = {
  navigate: "↑/k ↓/j navigate",
  rerun: "r rerun",
  proceed: "enter/space proceed",
  exit: "q/ctrl+c exit",
} as const;
