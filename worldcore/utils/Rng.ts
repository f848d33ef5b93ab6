//worldcore/utils/Rng.ts

/**
 * Seeded mulberry32 generator. Spawn-position picks go through this so a
 * seeded harness run or test replays the same placements.
 */
export class Rng {
  private state: number;

  constructor(seed: string | number) {
    if (typeof seed === "number") {
      this.state = (seed >>> 0) || 1;
    } else {
      this.state = Rng.hashString(seed);
    }
  }

  private static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return (h >>> 0) || 1;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  int(min: number, maxInclusive: number): number {
    return min + Math.floor(this.next() * (maxInclusive - min + 1));
  }

  /** Returns null for an empty list; callers pick their own fallback. */
  pick<T>(list: readonly T[]): T | null {
    if (list.length === 0) return null;
    return list[this.int(0, list.length - 1)] ?? null;
  }
}
