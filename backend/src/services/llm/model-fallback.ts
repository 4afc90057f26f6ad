import type { ModelTier } from "@lexstream/shared";
import { log } from "../../middleware/logger.js";

export type ModelPair = {
  primary: string;
  fallback: string;
};

/**
 * Which upstream model a conversation talks to. Switching is always the
 * caller's decision after it has shown the quota error; nothing here retries.
 * Not safe for concurrent in-flight requests on the same conversation.
 */
export class ModelFallbackController {
  private tier: ModelTier = "primary";

  constructor(private models: ModelPair) {}

  get active(): ModelTier {
    return this.tier;
  }

  get activeModel(): string {
    return this.models[this.tier];
  }

  markExhausted(): void {
    if (this.tier === "fallback") return;
    this.tier = "fallback";
    log.warn({ from: this.models.primary, to: this.models.fallback }, "Switched to fallback model");
  }

  reset(): void {
    if (this.tier === "primary") return;
    this.tier = "primary";
    log.info({ model: this.models.primary }, "Switched back to primary model");
  }
}
