// worldcore/sim/SimWorld.ts
// In-memory host simulation for the reinforcement harness and tests.
// No engine, no network: everything is a plain object you can poke.

import { Rng } from "../utils/Rng";
import { dist2 } from "../world/WorldTypes";
import type { UnitGroupSpec } from "../reinforcement/WaveTypes";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";
import type {
  Actor,
  AiTuning,
  Directive,
  Faction,
  GroupHandle,
  Prefab,
  SpawnPositionQuery,
  Strongpoint,
  UnitHandle,
  Vec3,
  VehicleHandle,
} from "../world/WorldTypes";

export type SimClock = () => number;

export type SimStrongpointSpec = {
  id: string;
  name: string;
  position: Vec3;
  factionKey: string | null;
};

export type SimBlockedZone = { center: Vec3; radius: number };

export type SimJournalEntry = { op: "spawn" | "despawn"; id: string };

export class SimActor implements Actor {
  private alive = true;

  constructor(
    readonly id: string,
    public position: Vec3,
    public faction: Faction | null,
  ) {}

  isAlive(): boolean {
    return this.alive;
  }

  kill(): void {
    this.alive = false;
  }
}

export class SimUnit implements UnitHandle, Actor {
  private alive = true;
  tuning: AiTuning | null = null;
  vehicleId: string | null = null;

  constructor(
    private readonly world: SimWorld,
    readonly id: string,
    readonly prefabId: string,
    readonly position: Vec3,
    readonly faction: Faction,
  ) {}

  isAlive(): boolean {
    return this.alive;
  }

  applyTuning(tuning: AiTuning): void {
    this.tuning = { ...tuning };
  }

  kill(): void {
    this.alive = false;
  }

  despawn(): void {
    if (!this.alive) return;
    this.alive = false;
    this.world.noteDespawn(this.id);
  }
}

export class SimGroup implements GroupHandle {
  private despawned = false;
  private readonly units: SimUnit[] = [];
  directives: Directive[];

  constructor(
    private readonly world: SimWorld,
    readonly id: string,
    readonly prefabId: string,
    readonly position: Vec3,
    readonly faction: Faction,
  ) {
    // Group prefabs come with a default route around their spawn position.
    this.directives = [{ kind: "patrol", waypoints: [{ ...position }] }];
  }

  /** Alive until despawned or until every member has died. */
  isAlive(): boolean {
    if (this.despawned) return false;
    return this.units.length === 0 || this.units.some((u) => u.isAlive());
  }

  addMember(prefab: Prefab): UnitHandle | null {
    if (this.despawned) return null;
    const unit = this.world.createUnit(prefab, this.position, this.faction);
    if (!unit) return null;
    this.units.push(unit);
    return unit;
  }

  members(): readonly SimUnit[] {
    return [...this.units];
  }

  clearDirectives(): void {
    this.directives = [];
  }

  addDirective(directive: Directive): void {
    this.directives.push(directive);
  }

  killAll(): void {
    for (const u of this.units) u.kill();
  }

  despawn(): void {
    if (this.despawned) return;
    this.despawned = true;
    for (const u of this.units) u.despawn();
    this.world.noteDespawn(this.id);
  }
}

export class SimVehicle implements VehicleHandle {
  private alive = true;
  crew: SimGroup | null = null;

  constructor(
    private readonly world: SimWorld,
    readonly id: string,
    readonly prefabId: string,
    readonly position: Vec3,
    readonly faction: Faction,
  ) {}

  isAlive(): boolean {
    return this.alive;
  }

  board(crew: GroupHandle): boolean {
    if (!this.alive || !crew.isAlive()) return false;
    const group = this.world.getGroup(crew.id);
    if (!group) return false;

    this.crew = group;
    for (const u of group.members()) u.vehicleId = this.id;
    return true;
  }

  kill(): void {
    this.alive = false;
  }

  despawn(): void {
    if (!this.alive) return;
    this.alive = false;
    this.world.noteDespawn(this.id);
  }
}

/**
 * WorldQueryFacade over plain maps. Availability toggles let tests take a
 * collaborator away (listStrongpoints / listActors answer null).
 */
export class SimWorld implements WorldQueryFacade {
  private readonly factions = new Map<string, Faction>();
  private readonly strongpoints = new Map<string, Strongpoint>();
  private readonly actors = new Map<string, SimActor>();
  private readonly prefabs = new Map<string, Prefab>();
  private readonly groups = new Map<string, SimGroup>();
  private readonly units = new Map<string, SimUnit>();
  private readonly vehicles = new Map<string, SimVehicle>();
  private readonly blockedZones: SimBlockedZone[] = [];
  private readonly rejectedSpawns = new Set<string>();
  private readonly journalEntries: SimJournalEntry[] = [];

  private readonly rng: Rng;
  private nextEntityId = 1;
  private players = 0;

  strongpointsAvailable = true;
  actorsAvailable = true;
  /** Upper bound on candidates returned per sampleSpawnPositions call. */
  maxCandidates = 8;

  constructor(
    private readonly clock: SimClock,
    seed: string | number = "sim:reinforcement",
  ) {
    this.rng = new Rng(seed);
  }

  // ----- setup -----

  addFaction(key: string, name?: string): Faction {
    const existing = this.factions.get(key);
    if (existing) return existing;
    const faction: Faction = name === undefined ? { key } : { key, name };
    this.factions.set(key, faction);
    return faction;
  }

  removeFaction(key: string): void {
    this.factions.delete(key);
  }

  addStrongpoint(spec: SimStrongpointSpec): Strongpoint {
    const sp: Strongpoint = {
      id: spec.id,
      name: spec.name,
      position: { ...spec.position },
      faction: spec.factionKey === null ? null : this.addFaction(spec.factionKey),
    };
    this.strongpoints.set(sp.id, sp);
    return sp;
  }

  /** Capture: the strongpoint changes hands. */
  setStrongpointFaction(id: string, factionKey: string | null): void {
    const sp = this.strongpoints.get(id);
    if (!sp) return;
    this.strongpoints.set(id, {
      ...sp,
      faction: factionKey === null ? null : this.addFaction(factionKey),
    });
  }

  addActor(id: string, position: Vec3, factionKey: string | null): SimActor {
    const faction = factionKey === null ? null : this.addFaction(factionKey);
    const actor = new SimActor(id, { ...position }, faction);
    this.actors.set(id, actor);
    return actor;
  }

  removeActor(id: string): void {
    this.actors.delete(id);
  }

  setPlayerCount(n: number): void {
    this.players = Math.max(0, Math.floor(n));
  }

  registerPrefabs(ids: Iterable<string>): void {
    for (const id of ids) this.prefabs.set(id, { id });
  }

  removePrefab(id: string): void {
    this.prefabs.delete(id);
  }

  /** spawnGroup / spawnVehicle / addMember refuse this prefab. */
  rejectSpawnsOf(prefabId: string): void {
    this.rejectedSpawns.add(prefabId);
  }

  addBlockedZone(zone: SimBlockedZone): void {
    this.blockedZones.push({ center: { ...zone.center }, radius: zone.radius });
  }

  // ----- WorldQueryFacade -----

  now(): number {
    return this.clock();
  }

  getStrongpoint(id: string): Strongpoint | null {
    return this.strongpoints.get(id) ?? null;
  }

  listStrongpoints(): readonly Strongpoint[] | null {
    if (!this.strongpointsAvailable) return null;
    return [...this.strongpoints.values()];
  }

  /** Scripted actors plus every live spawned unit. */
  listActors(): readonly Actor[] | null {
    if (!this.actorsAvailable) return null;
    const out: Actor[] = [...this.actors.values()];
    for (const u of this.units.values()) if (u.isAlive()) out.push(u);
    return out;
  }

  resolveFaction(key: string): Faction | null {
    return this.factions.get(key) ?? null;
  }

  playerCount(): number {
    return this.players;
  }

  sampleSpawnPositions(query: SpawnPositionQuery): Vec3[] {
    const out: Vec3[] = [];
    const minR = Math.max(0, Math.min(query.minRadius, query.maxRadius));
    const maxR = Math.max(query.minRadius, query.maxRadius);
    const sep2 = query.minSeparation * query.minSeparation;

    for (let i = 0; i < query.maxAttempts && out.length < this.maxCandidates; i++) {
      const angle = this.rng.range(0, Math.PI * 2);
      const r = this.rng.range(minR, maxR);
      const pos: Vec3 = {
        x: query.center.x + Math.cos(angle) * r,
        y: query.center.y,
        z: query.center.z + Math.sin(angle) * r,
      };

      if (this.blockedZones.some((z) => dist2(z.center, pos) <= z.radius * z.radius)) continue;
      if (this.occupiedPositions().some((p) => dist2(p, pos) < sep2)) continue;
      if (out.some((p) => dist2(p, pos) < sep2)) continue;

      out.push(pos);
    }
    return out;
  }

  loadPrefab(prefabId: string): Prefab | null {
    return this.prefabs.get(prefabId) ?? null;
  }

  spawnGroup(prefab: Prefab, position: Vec3, faction: Faction): SimGroup | null {
    if (this.rejectedSpawns.has(prefab.id)) return null;
    const group = new SimGroup(this, this.newId("grp"), prefab.id, { ...position }, faction);
    this.groups.set(group.id, group);
    this.journalEntries.push({ op: "spawn", id: group.id });
    return group;
  }

  spawnVehicle(prefab: Prefab, position: Vec3, faction: Faction): SimVehicle | null {
    if (this.rejectedSpawns.has(prefab.id)) return null;
    const vehicle = new SimVehicle(this, this.newId("veh"), prefab.id, { ...position }, faction);
    this.vehicles.set(vehicle.id, vehicle);
    this.journalEntries.push({ op: "spawn", id: vehicle.id });
    return vehicle;
  }

  // ----- host-side helpers -----

  /** What a host patrol cycle does for one composition entry. */
  spawnFromSpec(spec: UnitGroupSpec, position: Vec3, faction: Faction): SimGroup | null {
    const groupPrefab = this.loadPrefab(spec.groupPrefab);
    const memberPrefab = this.loadPrefab(spec.memberPrefab);
    if (!groupPrefab || !memberPrefab) return null;

    const group = this.spawnGroup(groupPrefab, position, faction);
    if (!group) return null;
    for (let i = 0; i < spec.memberCount; i++) group.addMember(memberPrefab);
    return group;
  }

  createUnit(prefab: Prefab, position: Vec3, faction: Faction): SimUnit | null {
    if (this.rejectedSpawns.has(prefab.id)) return null;
    const unit = new SimUnit(this, this.newId("unit"), prefab.id, { ...position }, faction);
    this.units.set(unit.id, unit);
    this.journalEntries.push({ op: "spawn", id: unit.id });
    return unit;
  }

  getGroup(id: string): SimGroup | null {
    return this.groups.get(id) ?? null;
  }

  liveGroups(): SimGroup[] {
    return [...this.groups.values()].filter((g) => g.isAlive());
  }

  liveVehicles(): SimVehicle[] {
    return [...this.vehicles.values()].filter((v) => v.isAlive());
  }

  liveUnits(): SimUnit[] {
    return [...this.units.values()].filter((u) => u.isAlive());
  }

  /** Spawns and despawns, in the order they happened. */
  journal(): readonly SimJournalEntry[] {
    return [...this.journalEntries];
  }

  /** Ids of despawned entities, in despawn order. */
  despawned(): string[] {
    return this.journalEntries.filter((e) => e.op === "despawn").map((e) => e.id);
  }

  noteDespawn(id: string): void {
    this.journalEntries.push({ op: "despawn", id });
  }

  private occupiedPositions(): Vec3[] {
    return [
      ...this.liveGroups().map((g) => g.position),
      ...this.liveVehicles().map((v) => v.position),
    ];
  }

  private newId(prefix: string): string {
    return `${prefix}-${this.nextEntityId++}`;
  }
}
