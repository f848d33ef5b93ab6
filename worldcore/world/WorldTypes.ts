// worldcore/world/WorldTypes.ts
// Shapes the reinforcement core reads from (and spawns into) the host
// simulation. Everything here is owned by the host; the core holds handles.

export type Vec3 = { x: number; y: number; z: number };

/** Planar (x/z) squared distance; height is ignored for range checks. */
export function dist2(a: Vec3, b: Vec3): number {
  const dx = a.x - b.x;
  const dz = a.z - b.z;
  return dx * dx + dz * dz;
}

/**
 * Factions are compared by reference. Two objects carrying the same key are
 * still different factions unless the host hands out the same instance.
 */
export interface Faction {
  readonly key: string;
  readonly name?: string;
}

export interface Strongpoint {
  readonly id: string;
  readonly name: string;
  readonly position: Vec3;
  /** null while unowned. */
  readonly faction: Faction | null;
}

export interface Actor {
  readonly id: string;
  readonly position: Vec3;
  readonly faction: Faction | null;
  isAlive(): boolean;
}

export interface Prefab {
  readonly id: string;
}

export type AiSkill = "regular" | "veteran" | "expert" | "elite";

export type AiTuning = {
  skill: AiSkill;
  perception: number;
};

export type Directive =
  | { kind: "defend"; strongpointId: string; position: Vec3 }
  /** Prefab-authored route a group may come with. */
  | { kind: "patrol"; waypoints: Vec3[] };

export interface EntityHandle {
  readonly id: string;
  /** false once destroyed in combat or removed from the simulation. */
  isAlive(): boolean;
  /** No-op when already gone. */
  despawn(): void;
}

export interface UnitHandle extends EntityHandle {
  applyTuning(tuning: AiTuning): void;
}

export interface GroupHandle extends EntityHandle {
  addMember(prefab: Prefab): UnitHandle | null;
  members(): readonly UnitHandle[];
  clearDirectives(): void;
  addDirective(directive: Directive): void;
}

export interface VehicleHandle extends EntityHandle {
  /** Puts the group's members into the vehicle; false when it cannot. */
  board(crew: GroupHandle): boolean;
}

export type SpawnPositionQuery = {
  center: Vec3;
  minRadius: number;
  maxRadius: number;
  /** Minimum spacing from other live entities. */
  minSeparation: number;
  maxAttempts: number;
};
