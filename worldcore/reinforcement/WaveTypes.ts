// worldcore/reinforcement/WaveTypes.ts

export type UnitGroupSpec = {
  /** Free-form label for logs and notifications (e.g. "fireteam"). */
  kind: string;
  groupPrefab: string;
  memberPrefab: string;
  memberCount: number;
};

export type AerialAssetSpec = {
  vehiclePrefab: string;
  crewGroupPrefab: string;
  crewPrefab: string;
  crewCount: number;
};

export type WaveSpec = {
  wave: number;
  label: string;
  /** Seconds of uninterrupted engagement before this wave may fire. */
  thresholdSeconds: number;
  spawnRadius: { min: number; max: number };
  groups: UnitGroupSpec[];
  aerial?: AerialAssetSpec;
};

export type CombatState = {
  active: boolean;
  /** Set exactly while active. */
  combatStartTime: number | null;
  lastWaveTime: number | null;
  currentWave: number;
};

export type SpawnFailureReason =
  | "missing_prefab"
  | "missing_faction"
  | "missing_strongpoint"
  | "spawn_rejected"
  | "stood_down";

export type SpawnFailure = {
  /** Group kind, or "aerial". */
  slot: string;
  reason: SpawnFailureReason;
  detail?: string;
};

export type WaveSpawnOutcome = "complete" | "partial" | "failed" | "queued";

export type WaveSpawnReport = {
  wave: number;
  strongpointId: string;
  requested: number;
  succeeded: number;
  failures: SpawnFailure[];
  outcome: WaveSpawnOutcome;
};

export function spawnOutcome(requested: number, succeeded: number): WaveSpawnOutcome {
  if (succeeded <= 0) return "failed";
  return succeeded >= requested ? "complete" : "partial";
}
