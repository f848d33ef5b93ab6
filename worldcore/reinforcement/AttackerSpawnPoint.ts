// worldcore/reinforcement/AttackerSpawnPoint.ts

import { PatrolSpawnPoint } from "./PatrolSpawnPoint";
import type { PatrolSpawnPointOptions } from "./PatrolSpawnPoint";
import type { ReinforcementContext } from "./ReinforcementContext";

/**
 * Attacking-side patrol. Uses the attacker profile and tuning; never joins
 * an election and never stands down.
 */
export class AttackerSpawnPoint extends PatrolSpawnPoint {
  constructor(ctx: ReinforcementContext, opts: PatrolSpawnPointOptions) {
    super(ctx, "attacker", opts);
  }
}
