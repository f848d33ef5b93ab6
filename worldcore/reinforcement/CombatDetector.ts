// worldcore/reinforcement/CombatDetector.ts

import { Logger } from "../utils/logger";
import { dist2 } from "../world/WorldTypes";
import type { Faction } from "../world/WorldTypes";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";

const log = Logger.scope("COMBAT_DETECT");

/**
 * Samples the world once per escalation tick. No hysteresis here; the
 * state machine only flips on tick boundaries, which is the debounce.
 */
export class CombatDetector {
  constructor(
    private readonly world: WorldQueryFacade,
    private readonly detectionRadius: number,
  ) {}

  /**
   * true when the strongpoint is still held by the defending faction and a
   * live hostile actor stands inside the detection radius. Anything that
   * cannot be resolved reads as "not under attack".
   */
  detect(strongpointId: string, defendingFaction: Faction | null): boolean {
    if (!defendingFaction) return false;

    const strongpoint = this.world.getStrongpoint(strongpointId);
    if (!strongpoint) return false;

    // Already lost (or never ours): nothing left to defend.
    if (!strongpoint.faction || strongpoint.faction !== defendingFaction) return false;

    const actors = this.world.listActors();
    if (!actors) {
      log.debug("Actor registry unavailable", { strongpointId });
      return false;
    }

    const r2 = this.detectionRadius * this.detectionRadius;
    for (const actor of actors) {
      if (!actor.faction || actor.faction === defendingFaction) continue;
      if (!actor.isAlive()) continue;
      if (dist2(actor.position, strongpoint.position) < r2) return true;
    }

    return false;
  }
}
