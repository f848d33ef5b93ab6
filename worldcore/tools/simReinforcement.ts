// worldcore/tools/simReinforcement.ts
/* eslint-disable no-console */

import dotenv from "dotenv";

import { readReinforcementConfig } from "../config/reinforcementConfig";
import { ManualCallQueue } from "../core/ManualCallQueue";
import { createReinforcementServices } from "../reinforcement/ReinforcementServices";
import { SimNotificationSink } from "../sim/SimNotificationSink";
import { SimPatrolCycle } from "../sim/SimPatrolCycle";
import { SimWorld } from "../sim/SimWorld";
import { WorldEventBus } from "../world/WorldEventBus";
import type { WorldEvent, WorldEventPayloads } from "../world/WorldEventBus";

dotenv.config();

type Cmd = "run" | "help";

type TimelineEntry = {
  atSeconds: number;
  event: WorldEvent;
  payload: WorldEventPayloads[WorldEvent];
};

const PREFABS = [
  "group.fireteam",
  "group.squad_rifle",
  "group.team_mg",
  "group.team_at",
  "group.aircrew",
  "unit.rifleman",
  "unit.machinegunner",
  "unit.antitank",
  "unit.pilot",
  "vehicle.transport_helicopter",
];

function usage(): void {
  console.log(`
Strongpoint Garrison: reinforcement simulation harness

Usage:
  node dist/worldcore/tools/simReinforcement.js run [options]

Options:
  --seconds <n>       simulated seconds of sustained attack (default: 1300)
  --hostiles <n>      hostile actors placed inside the detection radius (default: 3)
  --players <n>       connected player count for AI tuning (default: 4)
  --defenders <n>     defender spawn points at the strongpoint (default: 3)
  --seed <seed>       spawn-position seed (default: seed:alpha)
  --cycle             ride the patrol cycle instead of spawning waves directly
  --json              print the event timeline as JSON

Env (optional, .env is loaded):
  RF_CHECK_INTERVAL_MS, RF_WAVE_COOLDOWN_MS, RF_COMBAT_DETECTION_RADIUS, ...
`.trim());
}

function getFlag(argv: string[], name: string): string | null {
  const idx = argv.indexOf(name);
  if (idx === -1) return null;
  const v = argv[idx + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

function intFlag(argv: string[], name: string, fallback: number): number {
  const n = parseInt(getFlag(argv, name) ?? "", 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function main(argv: string[]): void {
  const cmd: Cmd = (argv[0] ?? "help").toLowerCase() === "run" ? "run" : "help";
  if (cmd === "help") {
    usage();
    return;
  }

  const seconds = intFlag(argv, "--seconds", 1300);
  const hostiles = intFlag(argv, "--hostiles", 3);
  const players = intFlag(argv, "--players", 4);
  const defenders = Math.max(1, intFlag(argv, "--defenders", 3));
  const seed = getFlag(argv, "--seed") ?? "seed:alpha";
  const cycle = hasFlag(argv, "--cycle");
  const asJson = hasFlag(argv, "--json");

  const queue = new ManualCallQueue();
  const clock = () => queue.now();
  const world = new SimWorld(clock, seed);
  const sink = new SimNotificationSink(clock);
  const events = new WorldEventBus();

  world.registerPrefabs(PREFABS);
  world.setPlayerCount(players);
  world.addStrongpoint({ id: "sp.ridge", name: "Ridge Outpost", position: { x: 0, y: 0, z: 0 }, factionKey: "blue" });
  world.addStrongpoint({ id: "sp.ford", name: "River Ford", position: { x: 1200, y: 0, z: 400 }, factionKey: "red" });

  const timeline: TimelineEntry[] = [];
  const record = <K extends WorldEvent>(event: K) => {
    events.on(event, (payload) => {
      timeline.push({ atSeconds: queue.now() / 1000, event, payload });
    });
  };
  record("reinforcement.coordinator.elected");
  record("reinforcement.combat.started");
  record("reinforcement.combat.ended");
  record("reinforcement.wave.started");
  record("reinforcement.lifecycle.teardown");

  const services = createReinforcementServices({
    world,
    sink,
    callQueue: queue,
    events,
    config: readReinforcementConfig(),
    seed,
  });

  const blue = world.addFaction("blue");
  const patrols: SimPatrolCycle[] = [];
  for (let i = 0; i < defenders; i++) {
    const patrol = new SimPatrolCycle(world, { x: 20 * i, y: 0, z: -30 }, blue);
    patrols.push(patrol);
    // Descending ids so the election has to pick, not just take the first.
    const sp = services.createDefender({
      id: 100 - i,
      faction: blue,
      patrol,
      orchestration: cycle ? "cycle" : "direct",
    });
    sp.prepareStrongpoint("sp.ridge");
  }

  // Host patrol framework cadence.
  queue.callLater(
    () => {
      for (const p of patrols) p.runCycle();
    },
    10_000,
    { repeat: true, label: "host:patrols" },
  );

  for (let i = 0; i < hostiles; i++) {
    world.addActor(`hostile-${i}`, { x: 80 + i * 10, y: 0, z: 40 }, "red");
  }

  queue.advanceTo(seconds * 1000);

  const summary = {
    seconds,
    hostiles,
    players,
    cycle,
    broadcasts: sink.sent.length,
    liveGroups: world.liveGroups().length,
    liveVehicles: world.liveVehicles().length,
    timeline,
  };

  if (asJson) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log(
    `[simReinforcement] seconds=${seconds} hostiles=${hostiles} players=${players} mode=${cycle ? "cycle" : "direct"}`,
  );
  for (const t of timeline) {
    console.log(`- t=${t.atSeconds.toFixed(1)}s ${t.event} ${JSON.stringify(t.payload)}`);
  }
  console.log(
    `[simReinforcement] broadcasts=${summary.broadcasts} liveGroups=${summary.liveGroups} liveVehicles=${summary.liveVehicles}`,
  );
}

try {
  main(process.argv.slice(2));
} catch (err: unknown) {
  console.error(err);
  process.exitCode = 1;
}
