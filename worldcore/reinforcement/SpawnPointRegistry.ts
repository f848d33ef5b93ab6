// worldcore/reinforcement/SpawnPointRegistry.ts

import type { WorldEventBus } from "../world/WorldEventBus";

/** A defender spawn point as seen by the election. */
export interface ElectionParticipant {
  readonly id: number;
  getStrongpointId(): string | null;
  isCoordinator(): boolean;
  isDestroyed(): boolean;
  setCoordinator(elected: boolean): void;
}

/**
 * Every live defender spawn point, keyed by id. Passed in explicitly instead
 * of being looked up as a process-wide singleton.
 */
export class SpawnPointRegistry {
  private readonly byId = new Map<number, ElectionParticipant>();

  constructor(private readonly events: WorldEventBus) {}

  register(sp: ElectionParticipant): void {
    if (this.byId.has(sp.id)) return;
    this.byId.set(sp.id, sp);
    this.events.emit("spawnpoint.registered", {
      spawnPointId: sp.id,
      strongpointId: sp.getStrongpointId(),
    });
  }

  unregister(sp: ElectionParticipant): void {
    if (this.byId.get(sp.id) !== sp) return;
    this.byId.delete(sp.id);
    this.events.emit("spawnpoint.removed", {
      spawnPointId: sp.id,
      strongpointId: sp.getStrongpointId(),
      wasCoordinator: sp.isCoordinator(),
    });
  }

  get(id: number): ElectionParticipant | null {
    return this.byId.get(id) ?? null;
  }

  list(): ElectionParticipant[] {
    return [...this.byId.values()];
  }

  listForStrongpoint(strongpointId: string): ElectionParticipant[] {
    return this.list().filter((sp) => sp.getStrongpointId() === strongpointId);
  }

  get size(): number {
    return this.byId.size;
  }
}
