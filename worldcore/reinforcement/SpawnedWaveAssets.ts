// worldcore/reinforcement/SpawnedWaveAssets.ts

import { Logger } from "../utils/logger";
import type { EntityHandle } from "../world/WorldTypes";

const log = Logger.scope("WAVE");

/**
 * Live handles from the most recent wave, in spawn order. Owned by the
 * coordinator spawn point. Stale handles (killed or removed elsewhere) are
 * pruned on sweep; they are not an error.
 */
export class SpawnedWaveAssets {
  private handles: EntityHandle[] = [];

  track(handle: EntityHandle): void {
    if (this.handles.some((h) => h.id === handle.id)) return;
    this.handles.push(handle);
  }

  /** Drops handles whose entity is gone. Returns how many were pruned. */
  sweep(): number {
    const before = this.handles.length;
    this.handles = this.handles.filter((h) => h.isAlive());
    return before - this.handles.length;
  }

  /**
   * Despawns everything still alive and empties the collection. Safe to call
   * repeatedly. Returns how many live entities were despawned.
   */
  despawnAll(): number {
    const current = this.handles;
    this.handles = [];

    let despawned = 0;
    for (const h of current) {
      if (!h.isAlive()) continue;
      try {
        h.despawn();
        despawned++;
      } catch (err: unknown) {
        log.warn("Despawn of wave asset failed", { entityId: h.id, error: String(err) });
      }
    }
    return despawned;
  }

  get size(): number {
    return this.handles.length;
  }

  list(): readonly EntityHandle[] {
    return [...this.handles];
  }
}
