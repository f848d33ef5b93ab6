// worldcore/reinforcement/EscalationStateMachine.ts

import type { WaveTable } from "./WaveTable";
import type { CombatState, WaveSpec } from "./WaveTypes";

export type EscalationDecision =
  | { kind: "idle" }
  | { kind: "disengaged"; lastWave: number }
  | { kind: "cooldown"; started: boolean; elapsedSeconds: number; cooldownLeftMs: number }
  | { kind: "maxed"; started: boolean; elapsedSeconds: number }
  | { kind: "waiting"; started: boolean; elapsedSeconds: number }
  | { kind: "fire"; started: boolean; elapsedSeconds: number; wave: WaveSpec };

/**
 * Combat-duration tracking for one strongpoint.
 *
 *  Idle --combat--> Engaged (combatStartTime = now)
 *  Engaged --no combat--> Idle (full reset, wave back to 0)
 *
 * While engaged, at most one wave fires per evaluation: the highest wave
 * above currentWave whose threshold has elapsed, and only once the cooldown
 * since the previous wave has passed. lastWaveTime survives a reset so the
 * cooldown also spans a quick disengage/re-engage.
 */
export class EscalationStateMachine {
  private state: CombatState = {
    active: false,
    combatStartTime: null,
    lastWaveTime: null,
    currentWave: 0,
  };

  constructor(
    private readonly waves: WaveTable,
    private readonly cooldownMs: number,
  ) {}

  evaluate(combatActive: boolean, nowMs: number): EscalationDecision {
    if (!combatActive) {
      if (!this.state.active) return { kind: "idle" };

      const lastWave = this.state.currentWave;
      this.state = {
        active: false,
        combatStartTime: null,
        lastWaveTime: this.state.lastWaveTime,
        currentWave: 0,
      };
      return { kind: "disengaged", lastWave };
    }

    let started = false;
    let combatStartTime = this.state.combatStartTime;
    if (!this.state.active || combatStartTime === null) {
      combatStartTime = nowMs;
      this.state = { ...this.state, active: true, combatStartTime };
      started = true;
    }

    const elapsedSeconds = Math.max(0, nowMs - combatStartTime) / 1000;

    if (this.state.lastWaveTime !== null) {
      const sinceLast = nowMs - this.state.lastWaveTime;
      if (sinceLast < this.cooldownMs) {
        return {
          kind: "cooldown",
          started,
          elapsedSeconds,
          cooldownLeftMs: this.cooldownMs - sinceLast,
        };
      }
    }

    if (this.state.currentWave >= this.waves.maxWave) {
      return { kind: "maxed", started, elapsedSeconds };
    }

    for (const wave of this.waves.descending()) {
      if (wave.wave <= this.state.currentWave) break;
      if (wave.thresholdSeconds <= elapsedSeconds) {
        this.state = { ...this.state, currentWave: wave.wave, lastWaveTime: nowMs };
        return { kind: "fire", started, elapsedSeconds, wave };
      }
    }

    return { kind: "waiting", started, elapsedSeconds };
  }

  get currentWave(): number {
    return this.state.currentWave;
  }

  get active(): boolean {
    return this.state.active;
  }

  snapshot(): CombatState {
    return { ...this.state };
  }
}
