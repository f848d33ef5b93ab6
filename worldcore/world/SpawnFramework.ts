// worldcore/world/SpawnFramework.ts
// Seam to the host's ordinary patrol respawn cycle. The host owns the timer
// and the standing group; spawn points only describe what the next cycle
// should spawn and occasionally force a cycle.

import type { GroupHandle } from "./WorldTypes";
import type { UnitGroupSpec } from "../reinforcement/WaveTypes";

export type SpawnMode =
  | { kind: "normal" }
  | { kind: "reinforcement"; wave: number };

export const NORMAL_MODE: SpawnMode = { kind: "normal" };

export type PatrolSpawnParams = {
  respawnPeriodSeconds: number;
  groupCount: number;
  /** Spawn dispersion around the spawn point. */
  dispersionRadius: number;
  /** Cycled through when groupCount exceeds its length. */
  composition: readonly UnitGroupSpec[];
};

/** Implemented by spawn points; read by the host on every cycle. */
export interface PatrolParamsSource {
  /**
   * Per-cycle lifecycle check. false means the standing defenders should
   * not exist right now and the host skips spawning.
   */
  update(): boolean;
  spawnParams(): PatrolSpawnParams;
  onPatrolSpawned(groups: readonly GroupHandle[]): void;
}

/** One patrol slot in the host framework. */
export interface PatrolCycle {
  bind(source: PatrolParamsSource): void;
  hasStandingGroup(): boolean;
  despawnStandingGroup(): void;
  /** Expire the respawn timer so the next cycle spawns immediately. */
  forceRespawnNow(): void;
}
