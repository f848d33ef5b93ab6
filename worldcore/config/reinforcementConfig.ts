// worldcore/config/reinforcementConfig.ts

import path from "path";

export interface ReinforcementConfig {
  /** Hostile actors inside this radius of a strongpoint count as an attack. */
  detectionRadius: number;
  /** Coordinator escalation tick period. */
  checkIntervalMs: number;
  /** Settling delay between strongpoint resolution and coordinator election. */
  electionDelayMs: number;
  /** Minimum gap between two waves at the same strongpoint. */
  waveCooldownMs: number;
  notifyDelayMs: number;
  notifyDisplaySeconds: number;
  /** An enemy-held strongpoint inside this radius makes a strongpoint frontline. */
  frontlineRadius: number;
  /** Non-frontline time after which standing defenders stand down. */
  inactivityGraceMs: number;
  spawnMinSeparation: number;
  spawnMaxAttempts: number;
  /** Re-elect among siblings when a coordinator is destroyed. */
  failover: boolean;
  waveTablePath: string;
  spawnProfilesPath: string;
}

function envInt(name: string, defaultValue: number): number {
  const raw = String(process.env[name] ?? "").trim();
  if (!raw) return defaultValue;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : defaultValue;
}

function envFloat(name: string, defaultValue: number): number {
  const raw = String(process.env[name] ?? "").trim();
  if (!raw) return defaultValue;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : defaultValue;
}

function envPath(name: string, defaultValue: string): string {
  const raw = String(process.env[name] ?? "").trim();
  return raw ? path.resolve(raw) : defaultValue;
}

const DATA_DIR = path.join(__dirname, "..", "data");

export const DEFAULT_REINFORCEMENT_CONFIG: Readonly<ReinforcementConfig> = {
  detectionRadius: 300,
  checkIntervalMs: 30_000,
  electionDelayMs: 5_000,
  waveCooldownMs: 10_000,
  notifyDelayMs: 100,
  notifyDisplaySeconds: 8,
  frontlineRadius: 2_000,
  inactivityGraceMs: 600_000,
  spawnMinSeparation: 5,
  spawnMaxAttempts: 25,
  failover: true,
  waveTablePath: path.join(DATA_DIR, "waves.json"),
  spawnProfilesPath: path.join(DATA_DIR, "spawnProfiles.json"),
};

/**
 * Env overrides on top of the built-in constants. With nothing set the
 * result equals DEFAULT_REINFORCEMENT_CONFIG.
 */
export function readReinforcementConfig(): ReinforcementConfig {
  const d = DEFAULT_REINFORCEMENT_CONFIG;
  return {
    detectionRadius: envFloat("RF_COMBAT_DETECTION_RADIUS", d.detectionRadius),
    checkIntervalMs: Math.max(100, envInt("RF_CHECK_INTERVAL_MS", d.checkIntervalMs)),
    electionDelayMs: envInt("RF_ELECTION_DELAY_MS", d.electionDelayMs),
    waveCooldownMs: envInt("RF_WAVE_COOLDOWN_MS", d.waveCooldownMs),
    notifyDelayMs: envInt("RF_NOTIFY_DELAY_MS", d.notifyDelayMs),
    notifyDisplaySeconds: envFloat("RF_NOTIFY_DISPLAY_SECONDS", d.notifyDisplaySeconds),
    frontlineRadius: envFloat("RF_FRONTLINE_RADIUS", d.frontlineRadius),
    inactivityGraceMs: envInt("RF_INACTIVITY_GRACE_MS", d.inactivityGraceMs),
    spawnMinSeparation: envFloat("RF_SPAWN_MIN_SEPARATION", d.spawnMinSeparation),
    spawnMaxAttempts: Math.max(1, envInt("RF_SPAWN_MAX_ATTEMPTS", d.spawnMaxAttempts)),
    failover: String(process.env.RF_COORDINATOR_FAILOVER ?? "").trim().toLowerCase() !== "false",
    waveTablePath: envPath("RF_WAVE_TABLE_PATH", d.waveTablePath),
    spawnProfilesPath: envPath("RF_SPAWN_PROFILES_PATH", d.spawnProfilesPath),
  };
}
