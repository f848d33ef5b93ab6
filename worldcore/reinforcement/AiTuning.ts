// worldcore/reinforcement/AiTuning.ts

import type { AiTuning } from "../world/WorldTypes";

// Small and medium tiers share the baseline.
const BASELINE: Readonly<AiTuning> = { skill: "expert", perception: 1.0 };
const ELEVATED: Readonly<AiTuning> = { skill: "elite", perception: 1.5 };

export type AiTuningTier = "small" | "medium" | "large";

export function tuningTierForPlayerCount(players: number): AiTuningTier {
  if (players < 5) return "small";
  if (players < 10) return "medium";
  return "large";
}

export function aiTuningForPlayerCount(players: number): AiTuning {
  const tier = tuningTierForPlayerCount(players);
  return tier === "large" ? { ...ELEVATED } : { ...BASELINE };
}
