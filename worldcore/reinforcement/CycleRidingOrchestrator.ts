// worldcore/reinforcement/CycleRidingOrchestrator.ts

import { Logger } from "../utils/logger";
import { NORMAL_MODE } from "../world/SpawnFramework";
import type { PatrolCycle, SpawnMode } from "../world/SpawnFramework";
import type { GroupHandle } from "../world/WorldTypes";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";
import type { ReinforcementNotifier } from "./ReinforcementNotifier";
import type { WaveTarget, WaveTrigger } from "./WaveTrigger";
import type { SpawnFailure, WaveSpawnReport, WaveSpec } from "./WaveTypes";

const log = Logger.scope("WAVE");

/** The spawn point whose mode the host reads on its next cycle. */
export interface SpawnModeTarget {
  getSpawnMode(): SpawnMode;
  setSpawnMode(mode: SpawnMode): void;
  /** True while the lifecycle guard keeps the host from spawning. */
  isStoodDown(): boolean;
}

/**
 * Wave materialisation that rides the host's own patrol cycle instead of
 * spawning directly: the standing group is cleared, the spawn point switches
 * to reinforcement mode, and the respawn timer is expired. The host then
 * spawns using spawnParamsFor(mode). Mode goes back to normal as soon as the
 * host reports that spawn, or when the engagement ends.
 *
 * Aerial assets are not supported by patrol cycles and are skipped. A stood
 * down spawn point has no cycle to ride, so its waves fail without an alert.
 */
export class CycleRidingOrchestrator implements WaveTrigger {
  constructor(
    private readonly world: WorldQueryFacade,
    private readonly patrol: PatrolCycle,
    private readonly modeTarget: SpawnModeTarget,
    private readonly notifier: ReinforcementNotifier,
  ) {}

  trigger(target: WaveTarget, wave: WaveSpec): WaveSpawnReport {
    target.assets.despawnAll();

    if (this.modeTarget.isStoodDown()) {
      log.warn(`Wave ${wave.wave} dropped; patrol cycle is stood down`, {
        strongpointId: target.strongpointId,
      });
      return {
        wave: wave.wave,
        strongpointId: target.strongpointId,
        requested: wave.groups.length,
        succeeded: 0,
        failures: wave.groups.map((g): SpawnFailure => ({ slot: g.kind, reason: "stood_down" })),
        outcome: "failed",
      };
    }

    if (this.patrol.hasStandingGroup()) {
      log.info("Despawning standing group to make room for reinforcements", {
        strongpointId: target.strongpointId,
      });
      this.patrol.despawnStandingGroup();
    }

    this.modeTarget.setSpawnMode({ kind: "reinforcement", wave: wave.wave });
    this.patrol.forceRespawnNow();

    log.info(`Wave ${wave.wave} queued on patrol cycle`, {
      strongpointId: target.strongpointId,
      groups: wave.groups.length,
      skippedAerial: wave.aerial !== undefined,
    });

    const name = this.world.getStrongpoint(target.strongpointId)?.name ?? target.strongpointId;
    this.notifier.announce(target.strongpointId, name, wave.wave);

    return {
      wave: wave.wave,
      strongpointId: target.strongpointId,
      requested: wave.groups.length,
      succeeded: 0,
      failures: [],
      outcome: "queued",
    };
  }

  onDisengage(_target: WaveTarget): void {
    this.modeTarget.setSpawnMode(NORMAL_MODE);
  }

  /**
   * Called from the spawn point when the host finished a cycle. Groups from a
   * reinforcement cycle are treated as wave assets and pointed at the
   * strongpoint.
   */
  onPatrolSpawned(target: WaveTarget, groups: readonly GroupHandle[]): void {
    const mode = this.modeTarget.getSpawnMode();
    if (mode.kind !== "reinforcement") return;

    const strongpoint = this.world.getStrongpoint(target.strongpointId);
    for (const group of groups) {
      if (strongpoint) {
        group.clearDirectives();
        group.addDirective({
          kind: "defend",
          strongpointId: strongpoint.id,
          position: { ...strongpoint.position },
        });
      }
      target.assets.track(group);
    }

    this.modeTarget.setSpawnMode(NORMAL_MODE);
    log.info(`Reinforcement cycle spawned for wave ${mode.wave}`, {
      strongpointId: target.strongpointId,
      groups: groups.length,
    });
  }
}
