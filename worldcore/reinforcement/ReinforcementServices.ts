// worldcore/reinforcement/ReinforcementServices.ts

import { readReinforcementConfig } from "../config/reinforcementConfig";
import { Logger } from "../utils/logger";
import { Rng } from "../utils/Rng";
import { WorldEventBus } from "../world/WorldEventBus";
import { AttackerSpawnPoint } from "./AttackerSpawnPoint";
import { CoordinatorElector } from "./CoordinatorElector";
import { DefenderSpawnPoint } from "./DefenderSpawnPoint";
import { ReinforcementNotifier } from "./ReinforcementNotifier";
import { SpawnPointRegistry } from "./SpawnPointRegistry";
import { loadSpawnProfiles } from "./SpawnProfiles";
import { loadWaveTable } from "./WaveTable";
import type { ReinforcementConfig } from "../config/reinforcementConfig";
import type { CallQueue } from "../core/CallQueue";
import type { NotificationSink } from "../world/NotificationSink";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";
import type { DefenderSpawnPointOptions } from "./DefenderSpawnPoint";
import type { PatrolSpawnPointOptions } from "./PatrolSpawnPoint";
import type { ReinforcementContext } from "./ReinforcementContext";
import type { SpawnProfiles } from "./SpawnProfiles";
import type { WaveTable } from "./WaveTable";

const log = Logger.scope("REINFORCE");

export interface ReinforcementServices extends ReinforcementContext {
  createDefender(opts: DefenderSpawnPointOptions): DefenderSpawnPoint;
  createAttacker(opts: PatrolSpawnPointOptions): AttackerSpawnPoint;
}

export type ReinforcementServicesOptions = {
  world: WorldQueryFacade;
  sink: NotificationSink;
  callQueue: CallQueue;
  events?: WorldEventBus;
  /** Defaults to readReinforcementConfig(). */
  config?: ReinforcementConfig;
  /** Defaults to the table at config.waveTablePath. */
  waves?: WaveTable;
  profiles?: SpawnProfiles;
  /** Seed for spawn-position picks. */
  seed?: string | number;
};

/**
 * Composition root for one simulation's reinforcement core. Data files are
 * loaded and validated here, so a bad table fails before any spawn point
 * exists.
 */
export function createReinforcementServices(
  opts: ReinforcementServicesOptions,
): ReinforcementServices {
  const config = opts.config ?? readReinforcementConfig();
  const waves = opts.waves ?? loadWaveTable(config.waveTablePath);
  const profiles = opts.profiles ?? loadSpawnProfiles(config.spawnProfilesPath);
  const events = opts.events ?? new WorldEventBus();
  const { world, callQueue } = opts;

  const registry = new SpawnPointRegistry(events);
  const elector = new CoordinatorElector(registry, callQueue, events, {
    electionDelayMs: config.electionDelayMs,
    failover: config.failover,
  });
  const notifier = new ReinforcementNotifier(opts.sink, callQueue, events, world, {
    delayMs: config.notifyDelayMs,
    displaySeconds: config.notifyDisplaySeconds,
  });
  const rng = new Rng(opts.seed ?? Date.now());

  const ctx: ReinforcementContext = {
    world,
    callQueue,
    events,
    config,
    waves,
    profiles,
    registry,
    elector,
    notifier,
    rng,
  };

  log.info("Reinforcement core ready", {
    waves: waves.size,
    maxWave: waves.maxWave,
    checkIntervalMs: config.checkIntervalMs,
    failover: config.failover,
  });

  return {
    ...ctx,
    createDefender: (spOpts) => new DefenderSpawnPoint(ctx, spOpts),
    createAttacker: (spOpts) => new AttackerSpawnPoint(ctx, spOpts),
  };
}
