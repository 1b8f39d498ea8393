import type { ModelMappingConfig } from "../config/index.js";
import { TIER_RULES } from "../config/models.js";
import type { ModelTier } from "../config/models.js";

export interface ModelMappingResult {
  backendModel: string;
  tier: ModelTier | null;
  /** True when the id matched no rule and no default was configured. */
  passthrough: boolean;
}

function tierModel(tier: ModelTier, mapping: ModelMappingConfig): string {
  switch (tier) {
    case "small":
      return mapping.smallModel;
    case "middle":
      return mapping.middleModel;
    case "big":
      return mapping.bigModel;
  }
}

export function mapModel(
  requestedModel: string | undefined,
  mapping: ModelMappingConfig,
): ModelMappingResult {
  const model = requestedModel?.trim() ?? "";

  if (!model) {
    return mapping.defaultModel
      ? { backendModel: mapping.defaultModel, tier: null, passthrough: false }
      : { backendModel: mapping.middleModel, tier: "middle", passthrough: false };
  }

  const lowered = model.toLowerCase();
  const rule = TIER_RULES.find((r) => lowered.includes(r.keyword));
  if (rule) {
    return { backendModel: tierModel(rule.tier, mapping), tier: rule.tier, passthrough: false };
  }

  if (mapping.defaultModel) {
    return { backendModel: mapping.defaultModel, tier: null, passthrough: false };
  }

  return { backendModel: model, tier: null, passthrough: true };
}
