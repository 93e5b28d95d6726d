import type { TokenUsage } from "@cmdfor/protocol";
import type { ModelPricing } from "./catalog.js";

const TOKENS_PER_PRICE_UNIT = 1_000_000;

/**
 * Estimated USD cost of one request from backend-reported usage.
 * Unrounded; the ledger stores the raw value.
 */
export function estimateCost(pricing: ModelPricing, usage: TokenUsage): number {
  return (
    (usage.inputTokens * pricing.input +
      usage.cachedInputTokens * pricing.cachedInput +
      usage.outputTokens * pricing.output) /
    TOKENS_PER_PRICE_UNIT
  );
}
