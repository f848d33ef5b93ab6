// worldcore/reinforcement/WaveTrigger.ts

import type { SpawnedWaveAssets } from "./SpawnedWaveAssets";
import type { WaveSpawnReport, WaveSpec } from "./WaveTypes";

/** What a wave is spawned for; built by the coordinator each time it fires. */
export type WaveTarget = {
  strongpointId: string;
  /** Resolved through the facade per spawn, so a vanished faction fails that spawn. */
  factionKey: string;
  assets: SpawnedWaveAssets;
};

/**
 * Materialises a fired wave. Implementations: WaveOrchestrator (spawns
 * directly) and CycleRidingOrchestrator (reconfigures and forces the host's
 * patrol cycle).
 */
export interface WaveTrigger {
  trigger(target: WaveTarget, wave: WaveSpec): WaveSpawnReport;
  /** Engagement at the strongpoint ended (state machine reset). */
  onDisengage(target: WaveTarget): void;
}
