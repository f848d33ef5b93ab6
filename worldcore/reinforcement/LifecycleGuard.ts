// worldcore/reinforcement/LifecycleGuard.ts

import { Logger } from "../utils/logger";
import { dist2 } from "../world/WorldTypes";
import type { Faction, Strongpoint } from "../world/WorldTypes";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";

const log = Logger.scope("LIFECYCLE");

export type LifecycleGuardOptions = {
  frontlineRadius: number;
  inactivityGraceMs: number;
};

export type LifecycleDebugState = {
  inactiveSinceMs: number | null;
  inactiveForMs: number;
  graceMs: number;
};

/** Held by someone other than the defenders (unowned does not count). */
function isEnemyHeld(sp: Strongpoint, defendingFaction: Faction): boolean {
  return sp.faction !== null && sp.faction !== defendingFaction;
}

/**
 * Decides whether a spawn point's standing defenders should exist at all.
 * Independent of escalation; each spawn point owns one guard and runs it on
 * its own update cadence.
 *
 * Friendly-held strongpoints near an enemy-held one are frontline and stay
 * garrisoned. Rear-area ones keep their garrison for a grace period after
 * they were last seen as frontline, then stand down. Anything the world
 * cannot answer keeps the garrison.
 */
export class LifecycleGuard {
  private inactiveSinceMs: number | null = null;

  constructor(
    private readonly world: WorldQueryFacade,
    private readonly opts: LifecycleGuardOptions,
  ) {}

  shouldRemainActive(strongpointId: string, defendingFaction: Faction | null, nowMs: number): boolean {
    if (!defendingFaction) return true;

    const strongpoint = this.world.getStrongpoint(strongpointId);
    if (!strongpoint) return true;

    // Only friendly-held strongpoints thin out.
    if (strongpoint.faction !== defendingFaction) {
      this.inactiveSinceMs = null;
      return true;
    }

    const all = this.world.listStrongpoints();
    if (!all) return true;

    const r2 = this.opts.frontlineRadius * this.opts.frontlineRadius;
    const frontline = all.some(
      (other) =>
        other.id !== strongpoint.id &&
        isEnemyHeld(other, defendingFaction) &&
        dist2(other.position, strongpoint.position) <= r2,
    );

    if (frontline) {
      if (this.inactiveSinceMs !== null) {
        log.debug("Strongpoint back on the frontline", { strongpointId });
      }
      this.inactiveSinceMs = null;
      return true;
    }

    if (this.inactiveSinceMs === null) {
      this.inactiveSinceMs = nowMs;
      log.debug("Rear-area strongpoint, inactivity timer started", { strongpointId });
      return true;
    }

    return nowMs - this.inactiveSinceMs <= this.opts.inactivityGraceMs;
  }

  /** Forget the inactivity timer, e.g. when the spawn point changes strongpoint. */
  reset(): void {
    this.inactiveSinceMs = null;
  }

    debugState(nowMs: number): LifecycleDebugState {
    return {
      inactiveSinceMs: this.inactiveSinceMs,
      inactiveForMs: this.inactiveSinceMs === null ? 0 : Math.max(0, nowMs - this.inactiveSinceMs),
      graceMs: this.opts.inactivityGraceMs,
    };
  }
}
