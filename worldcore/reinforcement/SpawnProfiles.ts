// worldcore/reinforcement/SpawnProfiles.ts

import fs from "fs";
import { z } from "zod";

import { ConfigDataError, unitGroupSchema } from "./WaveTable";
import type { WaveTable } from "./WaveTable";
import type { PatrolSpawnParams, SpawnMode } from "../world/SpawnFramework";

export type SpawnPointKind = "defender" | "attacker";

const profileSchema = z.object({
  respawnPeriodSeconds: z.number().int().min(1),
  groupCount: z.number().int().min(1),
  dispersionRadius: z.number().min(0),
  composition: z.array(unitGroupSchema).min(1),
});

const profilesSchema = z.object({
  defender: profileSchema,
  attacker: profileSchema,
});

export type SpawnProfile = PatrolSpawnParams;
export type SpawnProfiles = Record<SpawnPointKind, SpawnProfile>;

export function parseSpawnProfiles(raw: unknown): SpawnProfiles {
  const parsed = profilesSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigDataError(`invalid spawn profiles at ${first?.path.join(".") ?? "?"}: ${first?.message ?? "unknown"}`);
  }
  return parsed.data;
}

export function loadSpawnProfiles(filePath: string): SpawnProfiles {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err: unknown) {
    throw new ConfigDataError(`cannot read spawn profiles ${filePath}: ${String(err)}`);
  }
  return parseSpawnProfiles(raw);
}

/**
 * What the host's next patrol cycle should spawn. Reinforcement mode swaps
 * in the wave's composition and outer radius; the respawn period stays the
 * profile's. An unknown wave number falls back to the profile.
 */
export function spawnParamsFor(
  mode: SpawnMode,
  profile: SpawnProfile,
  waves: WaveTable,
): PatrolSpawnParams {
  if (mode.kind === "normal") return profile;

  const wave = waves.get(mode.wave);
  if (!wave) return profile;

  return {
    respawnPeriodSeconds: profile.respawnPeriodSeconds,
    groupCount: wave.groups.length,
    dispersionRadius: wave.spawnRadius.max,
    composition: wave.groups,
  };
}
