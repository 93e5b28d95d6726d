/**
 * Selector State — Types and Reducer
 *
 * The command list is driven by a single reducer. Key presses are mapped to
 * actions by keymap.ts; the Ink component only renders this state.
 */

import type { CommandSet, SelectorOutcome } from "@cmdfor/protocol";

// =============================================================================
// State
// =============================================================================

export interface SelectorState {
  /** Highlighted row, always in [0, count) when count > 0 */
  cursor: number;
  count: number;
  /** Set once; later actions are ignored */
  outcome: SelectorOutcome | null;
}

export function initialSelectorState(count: number): SelectorState {
  return { cursor: 0, count, outcome: null };
}

// =============================================================================
// Actions
// =============================================================================

export type SelectorAction =
  | { type: "UP" }
  | { type: "DOWN" }
  | { type: "SELECT"; commands: CommandSet }
  | { type: "RERUN" }
  | { type: "QUIT" };

// =============================================================================
// Reducer
// =============================================================================

export function selectorReducer(state: SelectorState, action: SelectorAction): SelectorState {
  if (state.outcome) return state;

  switch (action.type) {
    case "UP":
      if (state.count === 0) return state;
      return { ...state, cursor: (state.cursor - 1 + state.count) % state.count };

    case "DOWN":
      if (state.count === 0) return state;
      return { ...state, cursor: (state.cursor + 1) % state.count };

    case "SELECT": {
      const entry = action.commands[state.cursor];
      if (!entry) return state;
      return { ...state, outcome: { kind: "selected", command: entry.command } };
    }

    case "RERUN":
      return { ...state, outcome: { kind: "rerun" } };

    case "QUIT":
      return { ...state, outcome: { kind: "quit" } };

    default:
      return state;
  }
}

// =============================================================================
// Rows
// =============================================================================

/**
 * One display line per entry, comments aligned two columns past the
 * longest command.
 */
export function formatCommandRows(commands: CommandSet): string[] {
  const width = Math.max(0, ...commands.map((entry) => entry.command.length));
  return commands.map((entry) => {
    if (!entry.comment) return entry.command;
    const pad = " ".repeat(width - entry.command.length + 2);
    return `${entry.command}${pad}# ${entry.comment}`;
  });
}
