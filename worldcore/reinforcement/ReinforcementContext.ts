// worldcore/reinforcement/ReinforcementContext.ts

import type { ReinforcementConfig } from "../config/reinforcementConfig";
import type { CallQueue } from "../core/CallQueue";
import type { Rng } from "../utils/Rng";
import type { WorldEventBus } from "../world/WorldEventBus";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";
import type { CoordinatorElector } from "./CoordinatorElector";
import type { ReinforcementNotifier } from "./ReinforcementNotifier";
import type { SpawnPointRegistry } from "./SpawnPointRegistry";
import type { SpawnProfiles } from "./SpawnProfiles";
import type { WaveTable } from "./WaveTable";

/** Shared collaborators handed to every spawn point. */
export interface ReinforcementContext {
  world: WorldQueryFacade;
  callQueue: CallQueue;
  events: WorldEventBus;
  config: ReinforcementConfig;
  waves: WaveTable;
  profiles: SpawnProfiles;
  registry: SpawnPointRegistry;
  elector: CoordinatorElector;
  notifier: ReinforcementNotifier;
  rng: Rng;
}
