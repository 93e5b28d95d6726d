/**
 * cmdfor Protocol — Errors
 *
 * Failures are values: each one carries a machine-readable `code` and a
 * human-readable `message`. The orchestrator switches on `code`; nothing
 * between the producer and the orchestrator reclassifies them.
 */

// =============================================================================
// Completion errors
// =============================================================================

export interface MissingCredentialsError {
  code: "MISSING_CREDENTIALS";
  message: string;
  /** Environment variables that were checked, in precedence order */
  sources: readonly string[];
}

export interface UnsupportedModelError {
  code: "UNSUPPORTED_MODEL";
  message: string;
  model: string;
  supported: readonly string[];
}

export interface BackendRequestError {
  code: "BACKEND_REQUEST";
  message: string;
  cause: unknown;
}

export interface ResponseParseError {
  code: "RESPONSE_PARSE";
  message: string;
  cause: unknown;
}

export type CompletionError =
  | MissingCredentialsError
  | UnsupportedModelError
  | BackendRequestError
  | ResponseParseError;

// =============================================================================
// Injection errors
// =============================================================================

export interface CharInjectError {
  code: "INJECT";
  message: string;
  /** The character that could not be injected */
  char: string;
  cause: unknown;
  /** Set when restoring the terminal afterwards failed as well */
  restoreFailure?: unknown;
}

export interface PlatformUnsupportedError {
  code: "PLATFORM_UNSUPPORTED";
  message: string;
  platform: string;
}

export interface TerminalUnavailableError {
  code: "TERMINAL_UNAVAILABLE";
  message: string;
  cause: unknown;
  /** Set when restoring the terminal afterwards failed as well */
  restoreFailure?: unknown;
}

export interface TerminalRestoreError {
  code: "TERMINAL_RESTORE";
  message: string;
  cause: unknown;
}

export type InjectError =
  | CharInjectError
  | PlatformUnsupportedError
  | TerminalUnavailableError
  | TerminalRestoreError;

export type ErrorCode = CompletionError["code"] | InjectError["code"];

// =============================================================================
// Factories
// =============================================================================

export function createMissingCredentialsError(sources: readonly string[]): MissingCredentialsError {
  return {
    code: "MISSING_CREDENTIALS",
    message: `${sources.join(" or ")} environment variable must be set`,
    sources,
  };
}

export function createUnsupportedModelError(
  model: string,
  supported: readonly string[],
): UnsupportedModelError {
  return {
    code: "UNSUPPORTED_MODEL",
    message: `Unsupported model: ${model}`,
    model,
    supported,
  };
}

export function createBackendRequestError(cause: unknown): BackendRequestError {
  return {
    code: "BACKEND_REQUEST",
    message: `Completion request failed: ${causeMessage(cause)}`,
    cause,
  };
}

export function createResponseParseError(cause: unknown): ResponseParseError {
  return {
    code: "RESPONSE_PARSE",
    message: `Malformed completion response: ${causeMessage(cause)}`,
    cause,
  };
}

export function createCharInjectError(char: string, cause: unknown): CharInjectError {
  return {
    code: "INJECT",
    message: `Failed to inject character: ${JSON.stringify(char)}`,
    char,
    cause,
  };
}

export function createPlatformUnsupportedError(platform: string): PlatformUnsupportedError {
  return {
    code: "PLATFORM_UNSUPPORTED",
    message: `Terminal injection is not supported on ${platform}`,
    platform,
  };
}

export function createTerminalUnavailableError(cause: unknown): TerminalUnavailableError {
  return {
    code: "TERMINAL_UNAVAILABLE",
    message: `Terminal unavailable: ${causeMessage(cause)}`,
    cause,
  };
}

export function createTerminalRestoreError(cause: unknown): TerminalRestoreError {
  return {
    code: "TERMINAL_RESTORE",
    message: `Failed to restore terminal settings: ${causeMessage(cause)}`,
    cause,
  };
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Full detail of an error, including causes. Meant for debug output only;
 * user-facing text is chosen by the orchestrator from `code`.
 */
export function describeError(error: CompletionError | InjectError): string {
  const lines = [`[${error.code}] ${error.message}`];
  if ("cause" in error && error.cause !== undefined) {
    lines.push(`  cause: ${causeMessage(error.cause)}`);
  }
  if ("restoreFailure" in error && error.restoreFailure !== undefined) {
    lines.push(`  restore also failed: ${causeMessage(error.restoreFailure)}`);
  }
  return lines.join("\n");
}

export function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
