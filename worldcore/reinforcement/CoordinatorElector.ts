// worldcore/reinforcement/CoordinatorElector.ts

import { Logger } from "../utils/logger";
import type { CallHandle, CallQueue } from "../core/CallQueue";
import type { WorldEventBus } from "../world/WorldEventBus";
import type { ElectionParticipant, SpawnPointRegistry } from "./SpawnPointRegistry";

const log = Logger.scope("ELECTION");

export type ElectionCandidate = {
  id: number;
  strongpointId: string | null;
};

export type ElectionReason = "initial" | "failover" | "rebind";

export type CoordinatorElectorOptions = {
  electionDelayMs: number;
  failover: boolean;
};

/**
 * Lowest id among the candidates bound to the strongpoint, or null when
 * there are none. Order of the input does not matter.
 */
export function electCoordinator(
  candidates: readonly ElectionCandidate[],
  strongpointId: string,
): number | null {
  let lowest: number | null = null;
  for (const c of candidates) {
    if (c.strongpointId !== strongpointId) continue;
    if (lowest === null || c.id < lowest) lowest = c.id;
  }
  return lowest;
}

/**
 * Picks one coordinator per strongpoint without a central authority: each
 * spawn point runs the same deterministic comparison over the registry and
 * marks itself. Elections run after a settling delay so siblings that are
 * still resolving their strongpoint get a chance to register first.
 *
 * A sibling joining later does not trigger re-election, and its own
 * election defers to the sitting coordinator. With failover enabled, any
 * removal that leaves the strongpoint without a sitting coordinator does:
 * the coordinator itself going away, or the sibling every other one stepped
 * aside for going away before its own election ran.
 */
export class CoordinatorElector {
  constructor(
    private readonly registry: SpawnPointRegistry,
    private readonly callQueue: CallQueue,
    events: WorldEventBus,
    private readonly opts: CoordinatorElectorOptions,
  ) {
    if (opts.failover) {
      events.on("spawnpoint.removed", (p) => {
        if (!p.strongpointId) return;
        this.failover(p.strongpointId, p.spawnPointId, p.wasCoordinator);
      });
    }
  }

  scheduleElection(sp: ElectionParticipant, reason: ElectionReason): CallHandle {
    return this.callQueue.callLater(
      () => {
        this.runElection(sp, reason);
      },
      this.opts.electionDelayMs,
      { label: `elect:${sp.id}:${reason}` },
    );
  }

  /** Returns whether sp is now coordinator, or null when it cannot take part. */
  runElection(sp: ElectionParticipant, reason: ElectionReason = "initial"): boolean | null {
    if (sp.isDestroyed()) return null;

    const strongpointId = sp.getStrongpointId();
    if (!strongpointId) return null;

    const siblings = this.registry.listForStrongpoint(strongpointId);

    // A sibling that registered late never unseats a sitting coordinator.
    const incumbent = siblings.find((c) => c !== sp && c.isCoordinator());
    if (incumbent) {
      sp.setCoordinator(false);
      log.debug("Coordinator already elected; staying non-coordinator", {
        spawnPointId: sp.id,
        strongpointId,
        coordinatorId: incumbent.id,
      });
      return false;
    }

    const candidates = siblings.map((c) => ({
      id: c.id,
      strongpointId: c.getStrongpointId(),
    }));
    const winner = electCoordinator(candidates, strongpointId);
    const elected = winner === sp.id;

    sp.setCoordinator(elected);

    if (elected) {
      log.info("Spawn point is COORDINATOR", {
        spawnPointId: sp.id,
        strongpointId,
        reason,
        candidates: candidates.length,
      });
    } else {
      log.debug("Spawn point is non-coordinator (no periodic checks)", {
        spawnPointId: sp.id,
        strongpointId,
        coordinatorId: winner,
      });
    }

    return elected;
  }

  private failover(strongpointId: string, lostId: number, wasCoordinator: boolean): void {
    const siblings = this.registry.listForStrongpoint(strongpointId);
    if (!wasCoordinator && siblings.some((sp) => sp.isCoordinator())) return;

    if (siblings.length === 0) {
      if (wasCoordinator) log.warn("Coordinator lost with no siblings left", { strongpointId, lostId });
      return;
    }

    log.info(wasCoordinator ? "Coordinator lost; scheduling re-election" : "No coordinator seated; scheduling re-election", {
      strongpointId,
      lostId,
      siblings: siblings.map((s) => s.id),
    });
    for (const sp of siblings) this.scheduleElection(sp, "failover");
  }
}
