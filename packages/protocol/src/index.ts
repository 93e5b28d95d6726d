/**
 * @cmdfor/protocol — Data model and error taxonomy
 *
 * All packages in the cmdfor monorepo import their shared types from here.
 */

export type {
  CommandEntry,
  CommandSet,
  TokenUsage,
  CompletionResult,
  SelectorOutcome,
  Result,
} from "./types.js";

export { ok, err } from "./types.js";

export type {
  // Completion
  CompletionError,
  MissingCredentialsError,
  UnsupportedModelError,
  BackendRequestError,
  ResponseParseError,

  // Injection
  InjectError,
  CharInjectError,
  PlatformUnsupportedError,
  TerminalUnavailableError,
  TerminalRestoreError,

  ErrorCode,
} from "./errors.js";

export {
  createMissingCredentialsError,
  createUnsupportedModelError,
  createBackendRequestError,
  createResponseParseError,
  createCharInjectError,
  createPlatformUnsupportedError,
  createTerminalUnavailableError,
  createTerminalRestoreError,
  describeError,
  causeMessage,
} from "./errors.js";

export {
  CommandEntryWireSchema,
  CommandSetWireSchema,
  CommandSetSchema,
  COMMAND_SET_SCHEMA_NAME,
  COMMAND_SET_SCHEMA_DESCRIPTION,
  parseCommandSet,
  toWire,
  type CommandSetWire,
} from "./schema.js";
