export type ModelTier = "small" | "middle" | "big";

export interface TierRule {
  keyword: string;
  tier: ModelTier;
}

// Checked in order against the lower-cased client model id.
export const TIER_RULES: readonly TierRule[] = [
  { keyword: "haiku", tier: "small" },
  { keyword: "sonnet", tier: "middle" },
  { keyword: "opus", tier: "big" },
];
