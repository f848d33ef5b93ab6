// worldcore/core/CallQueue.ts

import { Logger } from "../utils/logger";

const log = Logger.scope("CALLQUEUE");

export interface CallHandle {
  readonly id: number;
  readonly label: string;
}

export interface CallLaterOptions {
  repeat?: boolean;
  /** Shows up in logs when the callback throws. */
  label?: string;
}

/**
 * Timer-scheduled callbacks on the single logical thread. Every suspension
 * point of the reinforcement core (deferred election, escalation tick,
 * delayed notification) goes through one of these.
 */
export interface CallQueue {
  callLater(fn: () => void, delayMs: number, opts?: CallLaterOptions): CallHandle;
  remove(handle: CallHandle): void;
}

/**
 * Runs a callback at its own boundary: a throw is logged and swallowed so a
 * failing strongpoint never stops another one's timers.
 */
export function runGuarded(label: string, fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    log.warn("Scheduled callback failed", {
      label,
      error: String(err),
    });
  }
}

/**
 * Wall-clock queue backed by setTimeout / setInterval. Timers are unref'd so
 * a pending reinforcement check never holds the process open.
 */
export class TimerCallQueue implements CallQueue {
  private nextId = 1;
  private readonly timers = new Map<number, { timer: NodeJS.Timeout; repeat: boolean }>();

  callLater(fn: () => void, delayMs: number, opts: CallLaterOptions = {}): CallHandle {
    const handle: CallHandle = { id: this.nextId++, label: opts.label ?? "anonymous" };
    const delay = Math.max(0, delayMs);
    const repeat = opts.repeat === true;

    const timer = repeat
      ? setInterval(() => runGuarded(handle.label, fn), Math.max(1, delay))
      : setTimeout(() => {
          this.timers.delete(handle.id);
          runGuarded(handle.label, fn);
        }, delay);
    timer.unref?.();

    this.timers.set(handle.id, { timer, repeat });
    return handle;
  }

  remove(handle: CallHandle): void {
    const entry = this.timers.get(handle.id);
    if (!entry) return;

    if (entry.repeat) clearInterval(entry.timer);
    else clearTimeout(entry.timer);
    this.timers.delete(handle.id);
  }

  pendingCount(): number {
    return this.timers.size;
  }

  clear(): void {
    for (const entry of this.timers.values()) {
      if (entry.repeat) clearInterval(entry.timer);
      else clearTimeout(entry.timer);
    }
    this.timers.clear();
  }
}
