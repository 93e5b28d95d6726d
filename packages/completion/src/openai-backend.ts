/**
 * OpenAI Backend
 *
 * Structured completion over OpenAI's chat completions endpoint via the
 * AI SDK. One HTTPS request per call: no streaming, no automatic retries.
 */

import { generateObject, NoObjectGeneratedError, type LanguageModelUsage } from "ai";
import { createOpenAI, type OpenAIProvider } from "@ai-sdk/openai";
import {
  ok,
  err,
  createBackendRequestError,
  createResponseParseError,
  type Result,
  type TokenUsage,
} from "@cmdfor/protocol";
import type {
  BackendError,
  CompletionBackend,
  StructuredRequest,
  StructuredResponse,
} from "./types.js";

export interface OpenAIBackendOptions {
  apiKey: string;
  /** Override the API endpoint (proxies, compatible servers) */
  baseURL?: string;
  /** Custom fetch implementation */
  fetch?: typeof globalThis.fetch;
}

export class OpenAIBackend implements CompletionBackend {
  private provider: OpenAIProvider;

  constructor(options: OpenAIBackendOptions) {
    this.provider = createOpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      fetch: options.fetch,
    });
  }

  async complete(request: StructuredRequest): Promise<Result<StructuredResponse, BackendError>> {
    const { policy } = request;
    try {
      const result = await generateObject({
        model: this.provider.chat(request.model),
        schema: request.schema,
        schemaName: request.schemaName,
        schemaDescription: request.schemaDescription,
        system: request.system,
        prompt: request.prompt,
        temperature: policy.temperature,
        topP: policy.topP,
        presencePenalty: policy.presencePenalty,
        frequencyPenalty: policy.frequencyPenalty,
        maxOutputTokens: policy.maxOutputTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(policy.timeoutMs),
        providerOptions: { openai: { strictJsonSchema: true } },
      });
      return ok({ body: result.object, usage: toTokenUsage(result.usage) });
    } catch (error) {
      // Body arrived but was not valid JSON for the schema (truncation included)
      if (NoObjectGeneratedError.isInstance(error)) {
        return err(createResponseParseError(error.cause ?? error));
      }
      return err(createBackendRequestError(error));
    }
  }
}

export function toTokenUsage(usage: LanguageModelUsage): TokenUsage {
  return {
    inputTokens: usage.inputTokens ?? 0,
    cachedInputTokens: usage.cachedInputTokens ?? 0,
    outputTokens: usage.outputTokens ?? 0,
  };
}

export function createOpenAIBackend(apiKey: string): CompletionBackend {
  return new OpenAIBackend({ apiKey });
}
