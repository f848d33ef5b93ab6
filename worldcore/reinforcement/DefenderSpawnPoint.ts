// worldcore/reinforcement/DefenderSpawnPoint.ts

import { Logger } from "../utils/logger";
import { NORMAL_MODE } from "../world/SpawnFramework";
import { CombatDetector } from "./CombatDetector";
import { CycleRidingOrchestrator } from "./CycleRidingOrchestrator";
import { EscalationStateMachine } from "./EscalationStateMachine";
import { LifecycleGuard } from "./LifecycleGuard";
import { PatrolSpawnPoint } from "./PatrolSpawnPoint";
import { SpawnedWaveAssets } from "./SpawnedWaveAssets";
import { WaveOrchestrator } from "./WaveOrchestrator";
import type { CallHandle } from "../core/CallQueue";
import type { GroupHandle } from "../world/WorldTypes";
import type { EscalationDecision } from "./EscalationStateMachine";
import type { PatrolSpawnPointOptions } from "./PatrolSpawnPoint";
import type { ReinforcementContext } from "./ReinforcementContext";
import type { ElectionParticipant } from "./SpawnPointRegistry";
import type { WaveTarget, WaveTrigger } from "./WaveTrigger";
import type { CombatState, WaveSpawnReport } from "./WaveTypes";

const log = Logger.scope("REINFORCE");

/** direct: spawn waves through the facade. cycle: ride the host's patrol cycle. */
export type WaveOrchestration = "direct" | "cycle";

export type DefenderSpawnPointOptions = PatrolSpawnPointOptions & {
  orchestration?: WaveOrchestration;
};

/**
 * Defending-side patrol bound to one strongpoint.
 *
 * Every defender takes part in the coordinator election for its strongpoint.
 * The elected one alone owns the escalation state and the spawned wave
 * assets, and runs the periodic check. Every defender, coordinator or not,
 * runs its own lifecycle guard on update().
 */
export class DefenderSpawnPoint extends PatrolSpawnPoint implements ElectionParticipant {
  private strongpointId: string | null = null;
  private coordinator = false;
  private coordinatorInitialized = false;
  private destroyed = false;
  private stoodDown = false;

  private tickHandle: CallHandle | null = null;
  private escalation: EscalationStateMachine | null = null;
  private assets: SpawnedWaveAssets | null = null;
  private lastReport: WaveSpawnReport | null = null;

  private readonly detector: CombatDetector;
  private readonly lifecycle: LifecycleGuard;
  private readonly waveTrigger: WaveTrigger;
  private readonly cycleRider: CycleRidingOrchestrator | null;

  constructor(ctx: ReinforcementContext, opts: DefenderSpawnPointOptions) {
    super(ctx, "defender", opts);

    const { config } = ctx;
    this.detector = new CombatDetector(ctx.world, config.detectionRadius);
    this.lifecycle = new LifecycleGuard(ctx.world, {
      frontlineRadius: config.frontlineRadius,
      inactivityGraceMs: config.inactivityGraceMs,
    });

    if (opts.orchestration === "cycle") {
      if (!this.patrol) {
        throw new Error(`spawn point ${opts.id}: cycle orchestration needs a patrol cycle`);
      }
      this.cycleRider = new CycleRidingOrchestrator(ctx.world, this.patrol, this, ctx.notifier);
      this.waveTrigger = this.cycleRider;
    } else {
      this.cycleRider = null;
      this.waveTrigger = new WaveOrchestrator(ctx.world, ctx.notifier, ctx.rng, {
        spawnMinSeparation: config.spawnMinSeparation,
        spawnMaxAttempts: config.spawnMaxAttempts,
      });
    }

    ctx.registry.register(this);
  }

  /**
   * Binds the spawn point to a strongpoint once the host has resolved it.
   * The first successful call schedules this spawn point's one election.
   * Binding to a different strongpoint later leaves the old one first (the
   * same way destroy() does) and stands for election at the new one.
   */
  prepareStrongpoint(strongpointId: string): boolean {
    if (this.destroyed) return false;

    const strongpoint = this.ctx.world.getStrongpoint(strongpointId);
    if (!strongpoint) {
      log.warn("Strongpoint not found; spawn point stays unbound", {
        spawnPointId: this.id,
        strongpointId,
      });
      return false;
    }

    if (this.strongpointId === strongpoint.id) return true;

    if (this.strongpointId !== null) {
      this.rebind(strongpoint.id);
      return true;
    }

    this.strongpointId = strongpoint.id;

    if (!this.coordinatorInitialized) {
      this.coordinatorInitialized = true;
      this.ctx.elector.scheduleElection(this, "initial");
      log.debug("Election scheduled", {
        spawnPointId: this.id,
        strongpointId: strongpoint.id,
        delayMs: this.ctx.config.electionDelayMs,
      });
    }
    return true;
  }

  setCoordinator(elected: boolean): void {
    if (this.destroyed || elected === this.coordinator) return;
    this.coordinator = elected;

    if (elected) {
      // Fresh state: a failover coordinator does not inherit its predecessor's.
      this.escalation = new EscalationStateMachine(this.ctx.waves, this.ctx.config.waveCooldownMs);
      this.assets = new SpawnedWaveAssets();
      this.tickHandle = this.ctx.callQueue.callLater(
        () => {
          this.tick();
        },
        this.ctx.config.checkIntervalMs,
        { repeat: true, label: `escalation:${this.id}` },
      );
      if (this.strongpointId) {
        this.ctx.events.emit("reinforcement.coordinator.elected", {
          spawnPointId: this.id,
          strongpointId: this.strongpointId,
        });
      }
      return;
    }

    this.cancelTick();
    this.escalation = null;
    this.assets = null;
  }

  /**
   * One escalation check. Runs on the coordinator's repeating timer; returns
   * the decision for callers that drive it directly, or null when this spawn
   * point is not an active coordinator.
   */
  tick(): EscalationDecision | null {
    if (this.destroyed || !this.coordinator) return null;

    const strongpointId = this.strongpointId;
    const escalation = this.escalation;
    const assets = this.assets;
    if (!strongpointId || !escalation || !assets) return null;

    const pruned = assets.sweep();
    if (pruned > 0) log.debug("Pruned dead wave assets", { strongpointId, pruned });

    const now = this.ctx.world.now();
    const combatActive = this.detector.detect(strongpointId, this.faction);
    const decision = escalation.evaluate(combatActive, now);
    const target: WaveTarget = { strongpointId, factionKey: this.faction.key, assets };

    if (decision.kind !== "idle" && decision.kind !== "disengaged" && decision.started) {
      log.info("Combat detected; duration tracking started", { strongpointId });
      this.ctx.events.emit("reinforcement.combat.started", { strongpointId, ts: now });
    }

    switch (decision.kind) {
      case "disengaged":
        log.info("Combat ended; escalation reset", { strongpointId, lastWave: decision.lastWave });
        this.waveTrigger.onDisengage(target);
        this.ctx.events.emit("reinforcement.combat.ended", {
          strongpointId,
          lastWave: decision.lastWave,
          ts: now,
        });
        break;
      case "cooldown":
        log.debug("Wave on cooldown", { strongpointId, cooldownLeftMs: decision.cooldownLeftMs });
        break;
      case "fire":
        log.info(`Escalating to wave ${decision.wave.wave}`, {
          strongpointId,
          label: decision.wave.label,
          elapsedSeconds: Math.floor(decision.elapsedSeconds),
        });
        this.lastReport = this.waveTrigger.trigger(target, decision.wave);
        break;
      default:
        break;
    }

    return decision;
  }

  /**
   * Per-cycle lifecycle check the host calls before spawning. Fails open
   * while the spawn point is still unbound.
   */
  update(): boolean {
    if (this.destroyed) return false;

    const strongpointId = this.strongpointId;
    if (!strongpointId) return true;

    const now = this.ctx.world.now();
    const keep = this.lifecycle.shouldRemainActive(strongpointId, this.faction, now);

    if (!keep && !this.stoodDown) {
      this.stoodDown = true;
      if (this.patrol?.hasStandingGroup()) this.patrol.despawnStandingGroup();
      log.info("Rear-area strongpoint idle too long; standing down", {
        spawnPointId: this.id,
        strongpointId,
      });
      this.ctx.events.emit("reinforcement.lifecycle.teardown", {
        spawnPointId: this.id,
        strongpointId,
        ts: now,
      });
    } else if (keep && this.stoodDown) {
      this.stoodDown = false;
      log.info("Strongpoint active again; resuming patrols", { spawnPointId: this.id, strongpointId });
    }

    return keep;
  }

  onPatrolSpawned(groups: readonly GroupHandle[]): void {
    super.onPatrolSpawned(groups);

    const strongpointId = this.strongpointId;
    if (this.cycleRider && this.assets && strongpointId) {
      this.cycleRider.onPatrolSpawned(
        { strongpointId, factionKey: this.faction.key, assets: this.assets },
        groups,
      );
    }
  }

  /** Stops the periodic check, removes the last wave, and leaves the registry. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.cancelTick();

    const removed = this.assets?.despawnAll() ?? 0;
    if (removed > 0) log.info("Wave assets removed with spawn point", { spawnPointId: this.id, removed });

    this.ctx.registry.unregister(this);

    this.coordinator = false;
    this.escalation = null;
    this.assets = null;
    log.debug("Spawn point destroyed", { spawnPointId: this.id, strongpointId: this.strongpointId });
  }

  getStrongpointId(): string | null {
    return this.strongpointId;
  }

  isCoordinator(): boolean {
    return this.coordinator;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  isStoodDown(): boolean {
    return this.stoodDown;
  }

  combatState(): CombatState | null {
    return this.escalation?.snapshot() ?? null;
  }

  trackedAssetCount(): number {
    return this.assets?.size ?? 0;
  }

  lastWaveReport(): WaveSpawnReport | null {
    return this.lastReport;
  }

  private rebind(strongpointId: string): void {
    const previous = this.strongpointId;

    this.cancelTick();
    const removed = this.assets?.despawnAll() ?? 0;

    // Unregister while still marked coordinator so the old strongpoint fails over.
    this.ctx.registry.unregister(this);
    this.setCoordinator(false);
    this.setSpawnMode(NORMAL_MODE);

    this.strongpointId = strongpointId;
    this.stoodDown = false;
    this.lifecycle.reset();
    this.ctx.registry.register(this);

    log.info("Spawn point moved to another strongpoint", {
      spawnPointId: this.id,
      from: previous,
      to: strongpointId,
      removed,
    });
    this.ctx.elector.scheduleElection(this, "rebind");
  }

  private cancelTick(): void {
    if (!this.tickHandle) return;
    this.ctx.callQueue.remove(this.tickHandle);
    this.tickHandle = null;
  }
}
