// Client
export { CompletionClient } from "./client.js";
export type { CompletionClientOptions } from "./client.js";

// Backend
export { DEFAULT_POLICY } from "./types.js";
export type {
  RequestPolicy,
  StructuredRequest,
  StructuredResponse,
  BackendError,
  CompletionBackend,
  BackendFactory,
} from "./types.js";
export { OpenAIBackend, createOpenAIBackend, toTokenUsage } from "./openai-backend.js";
export type { OpenAIBackendOptions } from "./openai-backend.js";

// Catalog
export { DEFAULT_CATALOG, DEFAULT_MODEL, findModel, supportedModelIds } from "./catalog.js";
export type { ModelCatalog, ModelDef, ModelPricing } from "./catalog.js";

// Cost
export { estimateCost } from "./cost.js";

// Prompts
export { DEFAULT_PROMPTS, buildUserPrompt, osName } from "./prompts.js";
export type { PromptSet } from "./prompts.js";

// Credentials
export { API_KEY_SOURCES, resolveApiKey } from "./credentials.js";
export type { Env } from "./credentials.js";
