// worldcore/core/ManualCallQueue.ts

import { runGuarded } from "./CallQueue";
import type { CallHandle, CallLaterOptions, CallQueue } from "./CallQueue";

type Entry = {
  handle: CallHandle;
  dueMs: number;
  seq: number;
  intervalMs: number | null;
  fn: () => void;
};

/**
 * Simulated-time call queue. Time only moves through advance()/advanceTo(),
 * and callbacks run in (due time, scheduling order). Backs the harness and
 * the tests, and doubles as the simulation clock (now()).
 */
export class ManualCallQueue implements CallQueue {
  private nowMs: number;
  private nextId = 1;
  private nextSeq = 1;
  private readonly entries = new Map<number, Entry>();

  constructor(startMs = 0) {
    this.nowMs = startMs;
  }

  now(): number {
    return this.nowMs;
  }

  callLater(fn: () => void, delayMs: number, opts: CallLaterOptions = {}): CallHandle {
    const handle: CallHandle = { id: this.nextId++, label: opts.label ?? "anonymous" };
    const delay = Math.max(0, delayMs);
    const intervalMs = opts.repeat ? Math.max(1, delay) : null;

    this.entries.set(handle.id, {
      handle,
      dueMs: this.nowMs + (intervalMs ?? delay),
      seq: this.nextSeq++,
      intervalMs,
      fn,
    });
    return handle;
  }

  remove(handle: CallHandle): void {
    this.entries.delete(handle.id);
  }

  pendingCount(): number {
    return this.entries.size;
  }

  pendingLabels(): string[] {
    return [...this.entries.values()]
      .sort((a, b) => a.dueMs - b.dueMs || a.seq - b.seq)
      .map((e) => e.handle.label);
  }

  advance(ms: number): void {
    this.advanceTo(this.nowMs + Math.max(0, ms));
  }

  advanceTo(targetMs: number): void {
    for (;;) {
      const next = this.nextDue(targetMs);
      if (!next) break;

      this.nowMs = next.dueMs;
      if (next.intervalMs === null) {
        this.entries.delete(next.handle.id);
      } else {
        next.dueMs += next.intervalMs;
        next.seq = this.nextSeq++;
      }
      runGuarded(next.handle.label, next.fn);
    }

    if (targetMs > this.nowMs) this.nowMs = targetMs;
  }

  private nextDue(limitMs: number): Entry | null {
    let best: Entry | null = null;
    for (const e of this.entries.values()) {
      if (e.dueMs > limitMs) continue;
      if (!best || e.dueMs < best.dueMs || (e.dueMs === best.dueMs && e.seq < best.seq)) {
        best = e;
      }
    }
    return best;
  }
}
