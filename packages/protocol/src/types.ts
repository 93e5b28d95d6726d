/**
 * cmdfor Protocol — Types
 *
 * The data exchanged between the completion backend, the selector and the
 * terminal injector. Everything here is plain data: no I/O, no classes.
 */

// =============================================================================
// Commands
// =============================================================================

/** One suggested shell command. */
export interface CommandEntry {
  /** The literal shell command (never empty) */
  readonly command: string;
  /** Short annotation, may be empty */
  readonly comment: string;
}

/** Suggestions in presentation order (the model's ordering). */
export type CommandSet = readonly CommandEntry[];

// =============================================================================
// Completion
// =============================================================================

/** Token counters reported by the backend for one request. */
export interface TokenUsage {
  inputTokens: number;
  cachedInputTokens: number;
  outputTokens: number;
}

export interface CompletionResult {
  commands: CommandSet;
  /** Estimated cost in USD */
  cost: number;
  usage: TokenUsage;
  /** Model the request was made with */
  model: string;
}

// =============================================================================
// Selector
// =============================================================================

export type SelectorOutcome =
  | { kind: "selected"; command: string }
  | { kind: "quit" }
  | { kind: "rerun" };

// =============================================================================
// Results
// =============================================================================

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
