// worldcore/test/waveOrchestrator.behavior.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { SpawnedWaveAssets } from "../reinforcement/SpawnedWaveAssets";
import { WaveOrchestrator } from "../reinforcement/WaveOrchestrator";
import type { WaveTarget } from "../reinforcement/WaveTrigger";
import type { WaveSpec } from "../reinforcement/WaveTypes";
import { Rng } from "../utils/Rng";
import { dist2 } from "../world/WorldTypes";
import { makeHarness, quietLogs, shippedWaves } from "./testUtils";
import type { Harness } from "./testUtils";

quietLogs();

function wave(n: number): WaveSpec {
  const spec = shippedWaves().get(n);
  if (!spec) throw new Error(`no wave ${n} in shipped table`);
  return spec;
}

function setup(players = 3): { h: Harness; orchestrator: WaveOrchestrator; target: WaveTarget } {
  const h = makeHarness();
  h.world.setPlayerCount(players);
  const orchestrator = new WaveOrchestrator(h.world, h.services.notifier, new Rng("test:orchestrator"), {
    spawnMinSeparation: 5,
    spawnMaxAttempts: 25,
  });
  const target: WaveTarget = { strongpointId: "sp.alpha", factionKey: "blue", assets: new SpawnedWaveAssets() };
  return { h, orchestrator, target };
}

test("[behavior] WaveOrchestrator: full wave spawns tuned groups with a single defend order", () => {
  const { h, orchestrator, target } = setup(3);

  const report = orchestrator.trigger(target, wave(1));

  assert.deepEqual(report, {
    wave: 1,
    strongpointId: "sp.alpha",
    requested: 2,
    succeeded: 2,
    failures: [],
    outcome: "complete",
  });

  const groups = h.world.liveGroups();
  assert.equal(groups.length, 2);
  assert.equal(target.assets.size, 2);
  for (const g of groups) {
    assert.equal(g.faction, h.blue);
    assert.equal(g.members().length, 4);
    for (const m of g.members()) assert.deepEqual(m.tuning, { skill: "expert", perception: 1 });
    assert.deepEqual(g.directives, [
      { kind: "defend", strongpointId: "sp.alpha", position: { x: 0, y: 0, z: 0 } },
    ]);
    const d2 = dist2(g.position, { x: 0, y: 0, z: 0 });
    assert.ok(d2 >= 100 * 100 && d2 <= 300 * 300, `group outside the wave ring: ${d2}`);
  }
});

test("[behavior] WaveOrchestrator: ten or more players get elevated tuning", () => {
  const { h, orchestrator, target } = setup(12);

  orchestrator.trigger(target, wave(1));

  const tunings = h.world.liveUnits().map((u) => u.tuning);
  assert.equal(tunings.length, 8);
  for (const t of tunings) assert.deepEqual(t, { skill: "elite", perception: 1.5 });
});

test("[behavior] WaveOrchestrator: the alert goes out after the notify delay", () => {
  const { h, orchestrator, target } = setup();

  orchestrator.trigger(target, wave(1));
  assert.equal(h.sink.sent.length, 0);

  h.queue.advance(99);
  assert.equal(h.sink.sent.length, 0);

  h.queue.advance(1);
  assert.deepEqual(h.sink.sent, [
    { title: "Enemy Reinforcements Detected", subtitle: "AO: Alpha Ridge", displayDurationSeconds: 8, atMs: 100 },
  ]);
  assert.deepEqual(h.seen.of("reinforcement.wave.started"), [
    { strongpointId: "sp.alpha", strongpointName: "Alpha Ridge", wave: 1, ts: 100 },
  ]);
});

test("[behavior] WaveOrchestrator: a failing sink is logged and the wave event still fires", () => {
  const { h, orchestrator, target } = setup();
  h.sink.failNext = true;

  orchestrator.trigger(target, wave(1));
  h.queue.advance(100);

  assert.equal(h.sink.sent.length, 0);
  assert.equal(h.seen.of("reinforcement.wave.started").length, 1);
});

test("[behavior] WaveOrchestrator: the previous wave is despawned before the next one spawns", () => {
  const { h, orchestrator, target } = setup();

  orchestrator.trigger(target, wave(1));
  const first = h.world.liveGroups();
  const firstIds = new Set(first.map((g) => g.id));

  orchestrator.trigger(target, wave(2));

  for (const g of first) assert.equal(g.isAlive(), false);
  const live = h.world.liveGroups();
  assert.deepEqual(live.map((g) => g.prefabId), ["group.squad_rifle", "group.squad_rifle"]);
  assert.equal(target.assets.size, 2);

  const journal = h.world.journal();
  const lastOldDespawn = Math.max(
    ...journal.flatMap((e, i) => (e.op === "despawn" && firstIds.has(e.id) ? [i] : [])),
  );
  const firstNewSpawn = journal.findIndex((e) => e.op === "spawn" && e.id === live[0]?.id);
  assert.ok(lastOldDespawn >= 0 && lastOldDespawn < firstNewSpawn);
});

test("[behavior] WaveOrchestrator: a missing prefab fails its group only", () => {
  const { h, orchestrator, target } = setup();
  h.world.removePrefab("unit.machinegunner");

  const report = orchestrator.trigger(target, wave(3));

  assert.equal(report.requested, 3);
  assert.equal(report.succeeded, 2);
  assert.equal(report.outcome, "partial");
  assert.deepEqual(report.failures, [
    { slot: "team_mg", reason: "missing_prefab", detail: "unit.machinegunner" },
  ]);

  h.queue.advance(100);
  assert.equal(h.sink.sent.length, 1);
});

test("[behavior] WaveOrchestrator: nothing spawned means no alert", () => {
  const { h, orchestrator, target } = setup();
  h.world.removeFaction("blue");

  const report = orchestrator.trigger(target, wave(1));

  assert.equal(report.outcome, "failed");
  assert.deepEqual(report.failures, [
    { slot: "fireteam", reason: "missing_faction", detail: "blue" },
    { slot: "fireteam", reason: "missing_faction", detail: "blue" },
  ]);

  h.queue.advance(1_000);
  assert.equal(h.sink.sent.length, 0);
  assert.equal(h.seen.of("reinforcement.wave.started").length, 0);
});

test("[behavior] WaveOrchestrator: a group that gets no members is removed and reported", () => {
  const { h, orchestrator, target } = setup();
  h.world.rejectSpawnsOf("unit.rifleman");

  const report = orchestrator.trigger(target, wave(1));

  assert.equal(report.outcome, "failed");
  assert.deepEqual(report.failures[0], { slot: "fireteam", reason: "spawn_rejected", detail: "no members spawned" });
  assert.equal(h.world.liveGroups().length, 0);
  assert.equal(target.assets.size, 0);
});

test("[behavior] WaveOrchestrator: unknown strongpoint fails every group", () => {
  const { orchestrator } = setup();
  const target: WaveTarget = { strongpointId: "sp.gone", factionKey: "blue", assets: new SpawnedWaveAssets() };

  const report = orchestrator.trigger(target, wave(1));

  assert.equal(report.outcome, "failed");
  assert.deepEqual(
    report.failures.map((f) => f.reason),
    ["missing_strongpoint", "missing_strongpoint"],
  );
});

test("[behavior] WaveOrchestrator: blocked terrain falls back to the strongpoint origin", () => {
  const { h, orchestrator, target } = setup();
  h.world.addBlockedZone({ center: { x: 0, y: 0, z: 0 }, radius: 1_000 });

  orchestrator.trigger(target, wave(1));

  const positions = h.world.liveGroups().map((g) => g.position);
  assert.deepEqual(positions, [
    { x: 0, y: 0, z: 0 },
    { x: 0, y: 0, z: 0 },
  ]);
});

test("[behavior] WaveOrchestrator: aerial asset spawns a crewed vehicle", () => {
  const { h, orchestrator, target } = setup();

  const report = orchestrator.trigger(target, wave(4));

  assert.equal(report.requested, 4);
  assert.equal(report.succeeded, 4);
  assert.equal(report.outcome, "complete");

  const vehicles = h.world.liveVehicles();
  assert.equal(vehicles.length, 1);
  const vehicle = vehicles[0];
  assert.equal(vehicle?.prefabId, "vehicle.transport_helicopter");
  assert.equal(vehicle?.crew?.prefabId, "group.aircrew");
  assert.deepEqual(
    vehicle?.crew?.members().map((m) => m.vehicleId),
    [vehicle?.id, vehicle?.id],
  );

  // three ground groups + crew group + vehicle
  assert.equal(target.assets.size, 5);
});

test("[behavior] WaveOrchestrator: a rejected vehicle takes its crew with it", () => {
  const { h, orchestrator, target } = setup();
  h.world.rejectSpawnsOf("vehicle.transport_helicopter");

  const report = orchestrator.trigger(target, wave(4));

  assert.equal(report.outcome, "partial");
  assert.deepEqual(report.failures, [
    { slot: "aerial", reason: "spawn_rejected", detail: "vehicle.transport_helicopter" },
  ]);
  assert.equal(target.assets.size, 3);
  assert.equal(h.world.liveGroups().filter((g) => g.prefabId === "group.aircrew").length, 0);
});

test("[behavior] WaveOrchestrator: a missing vehicle prefab spawns no crew at all", () => {
  const { h, orchestrator, target } = setup();
  h.world.removePrefab("vehicle.transport_helicopter");

  const report = orchestrator.trigger(target, wave(4));

  assert.deepEqual(report.failures, [
    { slot: "aerial", reason: "missing_prefab", detail: "vehicle.transport_helicopter" },
  ]);
  assert.equal(h.world.journal().filter((e) => e.op === "despawn").length, 0);
  assert.equal(target.assets.size, 3);
});
