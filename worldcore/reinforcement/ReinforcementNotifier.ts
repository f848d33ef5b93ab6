// worldcore/reinforcement/ReinforcementNotifier.ts

import { Logger } from "../utils/logger";
import type { CallQueue } from "../core/CallQueue";
import type { NotificationSink } from "../world/NotificationSink";
import type { WorldEventBus } from "../world/WorldEventBus";
import type { WorldQueryFacade } from "../world/WorldQueryFacade";

const log = Logger.scope("NOTIFY");

export const REINFORCEMENT_TITLE = "Enemy Reinforcements Detected";

export function reinforcementSubtitle(strongpointName: string): string {
  return `AO: ${strongpointName}`;
}

export type NotifierOptions = {
  delayMs: number;
  displaySeconds: number;
};

/**
 * Wave-start broadcast. Dispatch is deferred a little so clients have
 * registered the freshly created entities before the popup arrives.
 */
export class ReinforcementNotifier {
  constructor(
    private readonly sink: NotificationSink,
    private readonly callQueue: CallQueue,
    private readonly events: WorldEventBus,
    private readonly world: WorldQueryFacade,
    private readonly opts: NotifierOptions,
  ) {}

  announce(strongpointId: string, strongpointName: string, wave: number): void {
    this.callQueue.callLater(
      () => this.dispatch(strongpointId, strongpointName, wave),
      this.opts.delayMs,
      { label: `notify:${strongpointId}:wave${wave}` },
    );
  }

  private dispatch(strongpointId: string, strongpointName: string, wave: number): void {
    try {
      this.sink.broadcast(
        REINFORCEMENT_TITLE,
        reinforcementSubtitle(strongpointName),
        this.opts.displaySeconds,
      );
      log.info("Reinforcement alert sent", { strongpointId, wave });
    } catch (err: unknown) {
      log.warn("Notification sink failed", { strongpointId, wave, error: String(err) });
    }

    this.events.emit("reinforcement.wave.started", {
      strongpointId,
      strongpointName,
      wave,
      ts: this.world.now(),
    });
  }
}
