// worldcore/world/NotificationSink.ts

/** Fire-and-forget broadcast to connected players. */
export interface NotificationSink {
  broadcast(title: string, subtitle: string, displayDurationSeconds: number): void;
}
