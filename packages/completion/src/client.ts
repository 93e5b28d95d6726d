/**
 * Completion Client
 *
 * Turns a natural-language question into a CommandSet plus a cost estimate.
 * Model and credential checks run before any backend is created, so a
 * rejected request never reaches the network.
 */

import {
  ok,
  err,
  CommandSetWireSchema,
  COMMAND_SET_SCHEMA_NAME,
  COMMAND_SET_SCHEMA_DESCRIPTION,
  createBackendRequestError,
  createMissingCredentialsError,
  createUnsupportedModelError,
  parseCommandSet,
  type CompletionError,
  type CompletionResult,
  type Result,
} from "@cmdfor/protocol";
import { findModel, supportedModelIds, type ModelCatalog } from "./catalog.js";
import { estimateCost } from "./cost.js";
import { API_KEY_SOURCES, resolveApiKey, type Env } from "./credentials.js";
import { buildUserPrompt, type PromptSet } from "./prompts.js";
import {
  DEFAULT_POLICY,
  type BackendError,
  type BackendFactory,
  type RequestPolicy,
  type StructuredResponse,
} from "./types.js";

export interface CompletionClientOptions {
  catalog: ModelCatalog;
  prompts: PromptSet;
  /** Creates the backend for a resolved API key */
  createBackend: BackendFactory;
  /** Where API keys are looked up */
  env: Env;
  /** Host platform named in the prompt (process.platform values) */
  platform: string;
  policy?: RequestPolicy;
}

export class CompletionClient {
  private options: CompletionClientOptions;
  private policy: RequestPolicy;

  constructor(options: CompletionClientOptions) {
    this.options = options;
    this.policy = options.policy ?? DEFAULT_POLICY;
  }

  async requestCommands(
    question: string,
    model: string,
  ): Promise<Result<CompletionResult, CompletionError>> {
    const { catalog, prompts, env, platform } = this.options;

    const modelDef = findModel(catalog, model);
    if (!modelDef) {
      return err(createUnsupportedModelError(model, supportedModelIds(catalog)));
    }

    const apiKey = resolveApiKey(env);
    if (!apiKey) {
      return err(createMissingCredentialsError(API_KEY_SOURCES));
    }

    const backend = this.options.createBackend(apiKey);

    let response: Result<StructuredResponse, BackendError>;
    try {
      response = await backend.complete({
        model: modelDef.id,
        system: prompts.system,
        prompt: buildUserPrompt(prompts, platform, question),
        schema: CommandSetWireSchema,
        schemaName: COMMAND_SET_SCHEMA_NAME,
        schemaDescription: COMMAND_SET_SCHEMA_DESCRIPTION,
        policy: this.policy,
      });
    } catch (error) {
      return err(createBackendRequestError(error));
    }
    if (!response.ok) return response;

    const commands = parseCommandSet(response.value.body);
    if (!commands.ok) return commands;

    const { usage } = response.value;
    return ok({
      commands: commands.value,
      cost: estimateCost(modelDef.pricing, usage),
      usage,
      model: modelDef.id,
    });
  }
}
