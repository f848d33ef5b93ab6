// worldcore/sim/SimNotificationSink.ts

import type { NotificationSink } from "../world/NotificationSink";
import type { SimClock } from "./SimWorld";

export type SimBroadcast = {
  title: string;
  subtitle: string;
  displayDurationSeconds: number;
  atMs: number;
};

/** Records broadcasts instead of sending them. */
export class SimNotificationSink implements NotificationSink {
  readonly sent: SimBroadcast[] = [];
  failNext = false;

  constructor(private readonly clock: SimClock) {}

  broadcast(title: string, subtitle: string, displayDurationSeconds: number): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("broadcast transport unavailable");
    }
    this.sent.push({ title, subtitle, displayDurationSeconds, atMs: this.clock() });
  }
}
