// worldcore/reinforcement/PatrolSpawnPoint.ts

import { Logger } from "../utils/logger";
import { NORMAL_MODE } from "../world/SpawnFramework";
import { aiTuningForPlayerCount } from "./AiTuning";
import { spawnParamsFor } from "./SpawnProfiles";
import type {
  PatrolCycle,
  PatrolParamsSource,
  PatrolSpawnParams,
  SpawnMode,
} from "../world/SpawnFramework";
import type { Faction, GroupHandle } from "../world/WorldTypes";
import type { ReinforcementContext } from "./ReinforcementContext";
import type { SpawnPointKind, SpawnProfile } from "./SpawnProfiles";

const log = Logger.scope("REINFORCE");

export type PatrolSpawnPointOptions = {
  id: number;
  faction: Faction;
  /** Host patrol slot this spawn point describes; null when spawned outside one. */
  patrol?: PatrolCycle | null;
};

/**
 * Common base for spawn points that feed the host's patrol cycle: profile
 * parameters, spawn mode, and AI tuning of whatever the cycle spawns.
 */
export abstract class PatrolSpawnPoint implements PatrolParamsSource {
  readonly id: number;
  readonly faction: Faction;
  readonly kind: SpawnPointKind;

  protected readonly profile: SpawnProfile;
  protected readonly patrol: PatrolCycle | null;
  protected spawnMode: SpawnMode = NORMAL_MODE;

  protected constructor(
    protected readonly ctx: ReinforcementContext,
    kind: SpawnPointKind,
    opts: PatrolSpawnPointOptions,
  ) {
    this.id = opts.id;
    this.faction = opts.faction;
    this.kind = kind;
    this.profile = ctx.profiles[kind];
    this.patrol = opts.patrol ?? null;
    this.patrol?.bind(this);
  }

  update(): boolean {
    return true;
  }

  spawnParams(): PatrolSpawnParams {
    return spawnParamsFor(this.spawnMode, this.profile, this.ctx.waves);
  }

  onPatrolSpawned(groups: readonly GroupHandle[]): void {
    const players = this.ctx.world.playerCount();
    const tuning = aiTuningForPlayerCount(players);

    let tuned = 0;
    for (const group of groups) {
      for (const member of group.members()) {
        member.applyTuning(tuning);
        tuned++;
      }
    }

    log.debug("Patrol spawn tuned", {
      spawnPointId: this.id,
      kind: this.kind,
      players,
      skill: tuning.skill,
      units: tuned,
    });
  }

  getSpawnMode(): SpawnMode {
    return this.spawnMode;
  }

  setSpawnMode(mode: SpawnMode): void {
    this.spawnMode = mode;
  }
}
