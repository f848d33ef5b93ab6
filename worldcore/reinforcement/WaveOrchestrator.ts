// worldcore/reinforcement/WaveOrchestrator.ts

import { Logger } from "../utils/logger";
import { aiTuningForPlayerCount } from "./AiTuning";
import { spawnOutcome } from "./WaveTypes";
import type { Rng } from "../utils/Rng";
import type { ReinforcementNotifier } from "./ReinforcementNotifier";
import type { WaveTarget, WaveTrigger } from "./WaveTrigger";
import type {
  AerialAssetSpec,
  SpawnFailure,
  UnitGroupSpec,
  WaveSpawnReport,
  WaveSpec,
} from "./WaveTypes";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";
import type { AiTuning, GroupHandle, Strongpoint, Vec3 } from "../world/WorldTypes";

const log = Logger.scope("WAVE");

export type WaveOrchestratorOptions = {
  spawnMinSeparation: number;
  spawnMaxAttempts: number;
};

type GroupSpawnResult =
  | { ok: true; group: GroupHandle; strongpoint: Strongpoint; position: Vec3 }
  | { ok: false; failure: SpawnFailure };

/**
 * Direct-spawn wave materialisation.
 *
 * Order per trigger:
 *  1) despawn whatever the previous wave left alive (waves never stack)
 *  2) spawn each unit group around the strongpoint, tune members, give the
 *     group a single "defend" directive
 *  3) optional aerial asset (vehicle + crew)
 *  4) announce, if anything at all spawned
 *
 * A failed group is reported and skipped; the rest of the wave still runs.
 */
export class WaveOrchestrator implements WaveTrigger {
  constructor(
    private readonly world: WorldQueryFacade,
    private readonly notifier: ReinforcementNotifier,
    private readonly rng: Rng,
    private readonly opts: WaveOrchestratorOptions,
  ) {}

  trigger(target: WaveTarget, wave: WaveSpec): WaveSpawnReport {
    const despawned = target.assets.despawnAll();
    if (despawned > 0) {
      log.info("Previous wave despawned", { strongpointId: target.strongpointId, despawned });
    }

    const tuning = aiTuningForPlayerCount(this.world.playerCount());
    const failures: SpawnFailure[] = [];
    let succeeded = 0;

    for (const spec of wave.groups) {
      const res = this.spawnUnitGroup(target, wave, spec, tuning);
      if (res.ok) succeeded++;
      else failures.push(res.failure);
    }

    const requested = wave.groups.length + (wave.aerial ? 1 : 0);
    if (wave.aerial) {
      const failure = this.spawnAerial(target, wave, wave.aerial, tuning);
      if (failure) failures.push(failure);
      else succeeded++;
    }

    const report: WaveSpawnReport = {
      wave: wave.wave,
      strongpointId: target.strongpointId,
      requested,
      succeeded,
      failures,
      outcome: spawnOutcome(requested, succeeded),
    };

    if (report.outcome === "failed") {
      log.warn("Wave spawn failed entirely", { ...report });
      return report;
    }

    if (report.outcome === "partial") {
      log.warn("Wave spawned with failures", { ...report });
    } else {
      log.success(`Wave ${wave.wave} spawned`, {
        strongpointId: target.strongpointId,
        groups: succeeded,
        tracked: target.assets.size,
      });
    }

    const name = this.world.getStrongpoint(target.strongpointId)?.name ?? target.strongpointId;
    this.notifier.announce(target.strongpointId, name, wave.wave);
    return report;
  }

  onDisengage(_target: WaveTarget): void {
    // Wave units stay on the field after the fight; they are replaced, not recalled.
  }

  private spawnUnitGroup(
    target: WaveTarget,
    wave: WaveSpec,
    spec: UnitGroupSpec,
    tuning: AiTuning,
  ): GroupSpawnResult {
    const slot = spec.kind;

    const strongpoint = this.world.getStrongpoint(target.strongpointId);
    if (!strongpoint) {
      return { ok: false, failure: { slot, reason: "missing_strongpoint", detail: target.strongpointId } };
    }

    const faction = this.world.resolveFaction(target.factionKey);
    if (!faction) {
      return { ok: false, failure: { slot, reason: "missing_faction", detail: target.factionKey } };
    }

    const groupPrefab = this.world.loadPrefab(spec.groupPrefab);
    if (!groupPrefab) {
      return { ok: false, failure: { slot, reason: "missing_prefab", detail: spec.groupPrefab } };
    }

    const memberPrefab = this.world.loadPrefab(spec.memberPrefab);
    if (!memberPrefab) {
      return { ok: false, failure: { slot, reason: "missing_prefab", detail: spec.memberPrefab } };
    }

    const position = this.pickPosition(strongpoint.position, wave);
    const group = this.world.spawnGroup(groupPrefab, position, faction);
    if (!group) {
      return { ok: false, failure: { slot, reason: "spawn_rejected", detail: spec.groupPrefab } };
    }

    let members = 0;
    for (let i = 0; i < spec.memberCount; i++) {
      const unit = group.addMember(memberPrefab);
      if (!unit) continue;
      unit.applyTuning(tuning);
      members++;
    }

    if (members === 0) {
      group.despawn();
      return { ok: false, failure: { slot, reason: "spawn_rejected", detail: "no members spawned" } };
    }
    if (members < spec.memberCount) {
      log.warn("Group spawned short-handed", {
        strongpointId: target.strongpointId,
        kind: spec.kind,
        wanted: spec.memberCount,
        got: members,
      });
    }

    // Fresh groups may come with the prefab's own waypoints; replace them.
    group.clearDirectives();
    group.addDirective({
      kind: "defend",
      strongpointId: strongpoint.id,
      position: { ...strongpoint.position },
    });

    target.assets.track(group);
    return { ok: true, group, strongpoint, position };
  }

  private spawnAerial(
    target: WaveTarget,
    wave: WaveSpec,
    spec: AerialAssetSpec,
    tuning: AiTuning,
  ): SpawnFailure | null {
    const vehiclePrefab = this.world.loadPrefab(spec.vehiclePrefab);
    if (!vehiclePrefab) {
      return { slot: "aerial", reason: "missing_prefab", detail: spec.vehiclePrefab };
    }

    const crew = this.spawnUnitGroup(
      target,
      wave,
      {
        kind: "aerial",
        groupPrefab: spec.crewGroupPrefab,
        memberPrefab: spec.crewPrefab,
        memberCount: spec.crewCount,
      },
      tuning,
    );
    if (!crew.ok) return crew.failure;

    const faction = this.world.resolveFaction(target.factionKey);
    const vehicle = faction ? this.world.spawnVehicle(vehiclePrefab, crew.position, faction) : null;
    if (!vehicle) {
      crew.group.despawn();
      target.assets.sweep();
      return { slot: "aerial", reason: "spawn_rejected", detail: spec.vehiclePrefab };
    }

    if (!vehicle.board(crew.group)) {
      log.warn("Aircrew could not board", { strongpointId: target.strongpointId, vehicleId: vehicle.id });
    }

    target.assets.track(vehicle);
    return null;
  }

  private pickPosition(center: Vec3, wave: WaveSpec): Vec3 {
    const candidates = this.world.sampleSpawnPositions({
      center,
      minRadius: wave.spawnRadius.min,
      maxRadius: wave.spawnRadius.max,
      minSeparation: this.opts.spawnMinSeparation,
      maxAttempts: this.opts.spawnMaxAttempts,
    });

    const picked = this.rng.pick(candidates);
    if (picked) return { ...picked };

    log.debug("No clear spawn position; using strongpoint origin", { wave: wave.wave });
    return { ...center };
  }
}
