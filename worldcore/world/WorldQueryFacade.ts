// worldcore/world/WorldQueryFacade.ts

import type {
  Actor,
  Faction,
  GroupHandle,
  Prefab,
  SpawnPositionQuery,
  Strongpoint,
  Vec3,
  VehicleHandle,
} from "./WorldTypes";

/**
 * Everything the reinforcement core needs from the host simulation, passed
 * in at construction. A null return means the host could not answer
 * (collaborator missing); callers decide whether that fails open or closed.
 */
export interface WorldQueryFacade {
  /** Simulation timestamp in milliseconds. */
  now(): number;

  getStrongpoint(id: string): Strongpoint | null;
  /** All strongpoints, or null when the game mode / faction manager is unavailable. */
  listStrongpoints(): readonly Strongpoint[] | null;
  /** Live-actor registry, or null when it is unavailable. */
  listActors(): readonly Actor[] | null;

  resolveFaction(key: string): Faction | null;
  /** Total connected participants. */
  playerCount(): number;

  /** Terrain-safe candidate positions; empty when nothing valid was found. */
  sampleSpawnPositions(query: SpawnPositionQuery): Vec3[];

  loadPrefab(prefabId: string): Prefab | null;
  spawnGroup(prefab: Prefab, position: Vec3, faction: Faction): GroupHandle | null;
  spawnVehicle(prefab: Prefab, position: Vec3, faction: Faction): VehicleHandle | null;
}
