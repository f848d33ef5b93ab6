// worldcore/sim/SimPatrolCycle.ts

import type { PatrolCycle, PatrolParamsSource } from "../world/SpawnFramework";
import type { Faction, Vec3 } from "../world/WorldTypes";
import type { SimGroup, SimWorld } from "./SimWorld";

/**
 * Host-side patrol slot. The host calls runCycle() on its own cadence; a
 * cycle spawns only when the slot is empty and the respawn timer has run
 * out (or was forced).
 */
export class SimPatrolCycle implements PatrolCycle {
  private source: PatrolParamsSource | null = null;
  private standing: SimGroup[] = [];
  private hadGroup = false;
  /** null: the next cycle may spawn as soon as the slot is empty. */
  private respawnAtMs: number | null = null;
  private spawnIndex = 0;

  constructor(
    private readonly world: SimWorld,
    readonly position: Vec3,
    readonly faction: Faction,
  ) {}

  bind(source: PatrolParamsSource): void {
    this.source = source;
  }

  hasStandingGroup(): boolean {
    return this.standing.some((g) => g.isAlive());
  }

  despawnStandingGroup(): void {
    for (const g of this.standing) g.despawn();
    this.standing = [];
  }

  forceRespawnNow(): void {
    this.respawnAtMs = this.world.now();
  }

  standingGroups(): readonly SimGroup[] {
    return this.standing.filter((g) => g.isAlive());
  }

  runCycle(): SimGroup[] {
    const source = this.source;
    if (!source) return [];
    if (!source.update()) return [];

    this.standing = this.standing.filter((g) => g.isAlive());
    if (this.standing.length > 0) return [];

    const now = this.world.now();
    const params = source.spawnParams();

    if (this.respawnAtMs === null && this.hadGroup) {
      this.respawnAtMs = now + params.respawnPeriodSeconds * 1000;
    }
    if (this.respawnAtMs !== null && now < this.respawnAtMs) return [];

    const spawned: SimGroup[] = [];
    for (let i = 0; i < params.groupCount; i++) {
      const spec = params.composition[i % params.composition.length];
      if (!spec) continue;
      const group = this.world.spawnFromSpec(spec, this.dispersed(params.dispersionRadius), this.faction);
      if (group) spawned.push(group);
    }

    this.standing = spawned;
    this.hadGroup = spawned.length > 0;
    this.respawnAtMs = null;

    if (spawned.length > 0) source.onPatrolSpawned(spawned);
    return spawned;
  }

  // Deterministic ring placement; no rng needed for the harness.
  private dispersed(radius: number): Vec3 {
    const angle = (this.spawnIndex++ * Math.PI * 2) / 6;
    return {
      x: this.position.x + Math.cos(angle) * radius,
      y: this.position.y,
      z: this.position.z + Math.sin(angle) * radius,
    };
  }
}
