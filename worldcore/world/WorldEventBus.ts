// worldcore/world/WorldEventBus.ts
// ------------------------------------------------------------
// Typed publish/subscribe for reinforcement lifecycle events.
// Handlers are isolated: one throwing handler is logged and the
// rest still run.
// ------------------------------------------------------------

import { Logger } from "../utils/logger";

const log = Logger.scope("EVENT");

export type WorldEventPayloads = {
  "spawnpoint.registered": { spawnPointId: number; strongpointId: string | null };
  "spawnpoint.removed": {
    spawnPointId: number;
    strongpointId: string | null;
    wasCoordinator: boolean;
  };
  "reinforcement.coordinator.elected": { spawnPointId: number; strongpointId: string };
  "reinforcement.combat.started": { strongpointId: string; ts: number };
  "reinforcement.combat.ended": { strongpointId: string; lastWave: number; ts: number };
  "reinforcement.wave.started": {
    strongpointId: string;
    strongpointName: string;
    wave: number;
    ts: number;
  };
  "reinforcement.lifecycle.teardown": { spawnPointId: number; strongpointId: string; ts: number };
};

export type WorldEvent = keyof WorldEventPayloads;

type EventHandler<K extends WorldEvent> = (payload: WorldEventPayloads[K]) => void;

type HandlerTable = { [K in WorldEvent]?: Set<EventHandler<K>> };

export class WorldEventBus {
  private handlers: HandlerTable = {};

  on<K extends WorldEvent>(event: K, handler: EventHandler<K>): void {
    const handlers: { [P in K]?: Set<EventHandler<P>> } = this.handlers;
    let set = handlers[event];
    if (!set) {
      set = new Set<EventHandler<K>>();
      handlers[event] = set;
    }
    set.add(handler);
    log.debug(`Handler registered for event: ${event}`);
  }

  off<K extends WorldEvent>(event: K, handler: EventHandler<K>): void {
    this.handlers[event]?.delete(handler);
  }

  emit<K extends WorldEvent>(event: K, payload: WorldEventPayloads[K]): void {
    const set = this.handlers[event];
    if (!set || set.size === 0) return;

    log.debug(`Emitting event: ${event}`);
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (err: unknown) {
        log.error(`Handler error on event ${event}`, err);
      }
    }
  }

  clear(): void {
    this.handlers = {};
  }
}
