// worldcore/reinforcement/WaveTable.ts

import fs from "fs";
import { z } from "zod";

import type { WaveSpec } from "./WaveTypes";

/** Bad shape or values in one of the JSON data files. */
export class ConfigDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigDataError";
  }
}

export class WaveTableError extends ConfigDataError {
  constructor(message: string) {
    super(message);
    this.name = "WaveTableError";
  }
}

export const unitGroupSchema = z.object({
  kind: z.string().min(1),
  groupPrefab: z.string().min(1),
  memberPrefab: z.string().min(1),
  memberCount: z.number().int().min(1),
});

const aerialSchema = z.object({
  vehiclePrefab: z.string().min(1),
  crewGroupPrefab: z.string().min(1),
  crewPrefab: z.string().min(1),
  crewCount: z.number().int().min(1),
});

const waveSchema = z
  .object({
    wave: z.number().int().min(1),
    label: z.string().min(1),
    thresholdSeconds: z.number().int().min(0),
    spawnRadius: z.object({
      min: z.number().min(0),
      max: z.number().min(0),
    }),
    groups: z.array(unitGroupSchema).min(1),
    aerial: aerialSchema.optional(),
  })
  .refine((w) => w.spawnRadius.min <= w.spawnRadius.max, {
    message: "spawnRadius.min must not exceed spawnRadius.max",
    path: ["spawnRadius"],
  });

const waveTableSchema = z.object({
  waves: z.array(waveSchema).min(1),
});

/**
 * Ordered, validated wave configuration. Higher wave numbers always need
 * strictly more elapsed combat time.
 */
export class WaveTable {
  private readonly ascending: readonly WaveSpec[];
  private readonly highestFirst: readonly WaveSpec[];

  constructor(waves: readonly WaveSpec[]) {
    const sorted = [...waves].sort((a, b) => a.wave - b.wave);

    for (let i = 1; i < sorted.length; i++) {
      const prev = sorted[i - 1];
      const cur = sorted[i];
      if (cur.wave === prev.wave) {
        throw new WaveTableError(`duplicate wave number ${cur.wave}`);
      }
      if (cur.thresholdSeconds <= prev.thresholdSeconds) {
        throw new WaveTableError(
          `wave ${cur.wave} threshold ${cur.thresholdSeconds}s must exceed wave ${prev.wave} (${prev.thresholdSeconds}s)`,
        );
      }
    }

    this.ascending = sorted;
    this.highestFirst = [...sorted].reverse();
  }

  get maxWave(): number {
    return this.ascending.length > 0 ? this.ascending[this.ascending.length - 1].wave : 0;
  }

  get size(): number {
    return this.ascending.length;
  }

  get(wave: number): WaveSpec | null {
    return this.ascending.find((w) => w.wave === wave) ?? null;
  }

  /** Highest wave number first; the order escalation evaluates in. */
  descending(): readonly WaveSpec[] {
    return this.highestFirst;
  }

  all(): readonly WaveSpec[] {
    return this.ascending;
  }
}

export function parseWaveTable(raw: unknown): WaveTable {
  const parsed = waveTableSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? first.path.join(".") : "";
    throw new WaveTableError(`invalid wave table${where ? ` at ${where}` : ""}: ${first?.message ?? "unknown"}`);
  }
  return new WaveTable(parsed.data.waves);
}

export function loadWaveTable(filePath: string): WaveTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err: unknown) {
    throw new WaveTableError(`cannot read wave table ${filePath}: ${String(err)}`);
  }
  return parseWaveTable(raw);
}
