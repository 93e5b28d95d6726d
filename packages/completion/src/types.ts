/**
 * Backend types — transport agnostic.
 *
 * The client speaks to any structured-completion service through
 * CompletionBackend. OpenAIBackend is the production implementation;
 * tests provide their own. Backends classify their own failures; the
 * client still validates every body they return.
 */

import type { ZodType } from "zod";
import type {
  BackendRequestError,
  ResponseParseError,
  Result,
  TokenUsage,
} from "@cmdfor/protocol";

// =============================================================================
// Request policy (fixed, not user-tunable)
// =============================================================================

export interface RequestPolicy {
  temperature: number;
  topP: number;
  presencePenalty: number;
  frequencyPenalty: number;
  maxOutputTokens: number;
  /** Wall-clock deadline for one request */
  timeoutMs: number;
}

export const DEFAULT_POLICY: RequestPolicy = {
  temperature: 0.1,
  topP: 1,
  presencePenalty: 0,
  frequencyPenalty: 0,
  maxOutputTokens: 2048,
  timeoutMs: 10_000,
};

// =============================================================================
// Backend contract
// =============================================================================

export interface StructuredRequest {
  model: string;
  system: string;
  prompt: string;
  /** Output schema the backend must constrain its response to */
  schema: ZodType<unknown>;
  schemaName: string;
  schemaDescription: string;
  policy: RequestPolicy;
}

export interface StructuredResponse {
  /** Decoded JSON body, not yet validated */
  body: unknown;
  usage: TokenUsage;
}

export type BackendError = BackendRequestError | ResponseParseError;

export interface CompletionBackend {
  complete(request: StructuredRequest): Promise<Result<StructuredResponse, BackendError>>;
}

export type BackendFactory = (apiKey: string) => CompletionBackend;
