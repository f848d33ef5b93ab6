// worldcore/test/coordinatorElector.behavior.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { electCoordinator } from "../reinforcement/CoordinatorElector";
import { makeHarness, quietLogs } from "./testUtils";

quietLogs();

test("[behavior] electCoordinator picks the lowest id per strongpoint, order-independent", () => {
  const candidates = [
    { id: 12, strongpointId: "sp.alpha" },
    { id: 7, strongpointId: "sp.alpha" },
    { id: 3, strongpointId: "sp.bravo" },
    { id: 9, strongpointId: null },
  ];

  assert.equal(electCoordinator(candidates, "sp.alpha"), 7);
  assert.equal(electCoordinator([...candidates].reverse(), "sp.alpha"), 7);
  assert.equal(electCoordinator(candidates, "sp.bravo"), 3);
  assert.equal(electCoordinator(candidates, "sp.charlie"), null);
  assert.equal(electCoordinator([], "sp.alpha"), null);
});

test("[behavior] exactly one defender per strongpoint becomes coordinator after the settling delay", () => {
  const h = makeHarness();
  const a12 = h.services.createDefender({ id: 12, faction: h.blue });
  const a7 = h.services.createDefender({ id: 7, faction: h.blue });
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  const b4 = h.services.createDefender({ id: 4, faction: h.red });

  for (const sp of [a12, a7, a9]) assert.equal(sp.prepareStrongpoint("sp.alpha"), true);
  assert.equal(b4.prepareStrongpoint("sp.bravo"), true);

  h.queue.advance(4_999);
  assert.equal(a7.isCoordinator(), false, "no election before the delay");

  h.queue.advance(1);
  assert.deepEqual(
    [a12, a7, a9, b4].map((sp) => sp.isCoordinator()),
    [false, true, false, true],
  );
  assert.deepEqual(h.seen.of("reinforcement.coordinator.elected"), [
    { spawnPointId: 7, strongpointId: "sp.alpha" },
    { spawnPointId: 4, strongpointId: "sp.bravo" },
  ]);

  // Only coordinators keep periodic work.
  assert.deepEqual(h.queue.pendingLabels(), ["escalation:7", "escalation:4"]);
});

test("[behavior] election is scheduled once per spawn point even if the strongpoint resolves twice", () => {
  const h = makeHarness();
  const sp = h.services.createDefender({ id: 7, faction: h.blue });

  sp.prepareStrongpoint("sp.alpha");
  sp.prepareStrongpoint("sp.alpha");

  assert.deepEqual(h.queue.pendingLabels(), ["elect:7:initial"]);
});

test("[behavior] unresolvable strongpoint schedules no election", () => {
  const h = makeHarness();
  const sp = h.services.createDefender({ id: 7, faction: h.blue });

  assert.equal(sp.prepareStrongpoint("sp.missing"), false);
  assert.equal(sp.getStrongpointId(), null);
  assert.equal(h.queue.pendingCount(), 0);
});

test("[behavior] a late sibling with a lower id does not unseat the coordinator", () => {
  const h = makeHarness();
  const a7 = h.services.createDefender({ id: 7, faction: h.blue });
  const a12 = h.services.createDefender({ id: 12, faction: h.blue });
  a7.prepareStrongpoint("sp.alpha");
  a12.prepareStrongpoint("sp.alpha");
  h.queue.advance(5_000);

  const late = h.services.createDefender({ id: 1, faction: h.blue });
  late.prepareStrongpoint("sp.alpha");
  h.queue.advance(5_000);

  assert.equal(a7.isCoordinator(), true);
  assert.equal(late.isCoordinator(), false);
  assert.equal(h.seen.of("reinforcement.coordinator.elected").length, 1);
});

test("[behavior] destroying the coordinator promotes the next-lowest sibling with fresh state", () => {
  const h = makeHarness();
  const a12 = h.services.createDefender({ id: 12, faction: h.blue });
  const a7 = h.services.createDefender({ id: 7, faction: h.blue });
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  for (const sp of [a12, a7, a9]) sp.prepareStrongpoint("sp.alpha");
  h.queue.advance(5_000);

  a7.destroy();

  assert.deepEqual(h.seen.of("spawnpoint.removed"), [
    { spawnPointId: 7, strongpointId: "sp.alpha", wasCoordinator: true },
  ]);
  assert.deepEqual(h.queue.pendingLabels(), ["elect:12:failover", "elect:9:failover"]);

  h.queue.advance(5_000);

  assert.equal(a9.isCoordinator(), true);
  assert.equal(a12.isCoordinator(), false);
  assert.deepEqual(a9.combatState(), {
    active: false,
    combatStartTime: null,
    lastWaveTime: null,
    currentWave: 0,
  });
  assert.deepEqual(h.queue.pendingLabels(), ["escalation:9"]);
});

test("[behavior] with failover disabled a destroyed coordinator leaves the strongpoint uncoordinated", () => {
  const h = makeHarness({ config: { failover: false } });
  const a7 = h.services.createDefender({ id: 7, faction: h.blue });
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  a7.prepareStrongpoint("sp.alpha");
  a9.prepareStrongpoint("sp.alpha");
  h.queue.advance(5_000);

  a7.destroy();
  h.queue.advance(60_000);

  assert.equal(a9.isCoordinator(), false);
  assert.equal(h.queue.pendingCount(), 0);
});

test("[behavior] destroying a non-coordinator does not trigger an election", () => {
  const h = makeHarness();
  const a7 = h.services.createDefender({ id: 7, faction: h.blue });
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  a7.prepareStrongpoint("sp.alpha");
  a9.prepareStrongpoint("sp.alpha");
  h.queue.advance(5_000);

  a9.destroy();
  a9.destroy();

  assert.equal(h.seen.of("spawnpoint.removed").length, 1);
  assert.deepEqual(h.queue.pendingLabels(), ["escalation:7"]);
  assert.equal(h.services.registry.size, 1);
});

test("[behavior] moving the coordinator to another strongpoint fails over the old one and defers at the new one", () => {
  const h = makeHarness();
  h.world.addStrongpoint({ id: "sp.charlie", name: "Charlie Ford", position: { x: -3000, y: 0, z: 0 }, factionKey: "blue" });
  const a3 = h.services.createDefender({ id: 3, faction: h.blue });
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  const c5 = h.services.createDefender({ id: 5, faction: h.blue });
  a3.prepareStrongpoint("sp.alpha");
  a9.prepareStrongpoint("sp.alpha");
  c5.prepareStrongpoint("sp.charlie");
  h.queue.advance(5_000);
  assert.deepEqual([a3, a9, c5].map((sp) => sp.isCoordinator()), [true, false, true]);

  assert.equal(a3.prepareStrongpoint("sp.charlie"), true);

  assert.equal(a3.isCoordinator(), false);
  assert.equal(a3.getStrongpointId(), "sp.charlie");
  assert.deepEqual(h.seen.of("spawnpoint.removed"), [
    { spawnPointId: 3, strongpointId: "sp.alpha", wasCoordinator: true },
  ]);

  h.queue.advance(60_000);

  const coordinatorsOf = (strongpointId: string) =>
    h.services.registry
      .listForStrongpoint(strongpointId)
      .filter((sp) => sp.isCoordinator())
      .map((sp) => sp.id);
  assert.deepEqual(coordinatorsOf("sp.alpha"), [9]);
  assert.deepEqual(coordinatorsOf("sp.charlie"), [5]);
  assert.deepEqual(h.seen.of("reinforcement.coordinator.elected"), [
    { spawnPointId: 3, strongpointId: "sp.alpha" },
    { spawnPointId: 5, strongpointId: "sp.charlie" },
    { spawnPointId: 9, strongpointId: "sp.alpha" },
  ]);
  assert.equal(a3.combatState(), null);
});

test("[behavior] losing the sibling everyone stepped aside for still elects a coordinator", () => {
  const h = makeHarness();
  const a9 = h.services.createDefender({ id: 9, faction: h.blue });
  const a12 = h.services.createDefender({ id: 12, faction: h.blue });
  a9.prepareStrongpoint("sp.alpha");
  a12.prepareStrongpoint("sp.alpha");

  h.queue.advance(3_000);
  const a3 = h.services.createDefender({ id: 3, faction: h.blue });
  a3.prepareStrongpoint("sp.alpha");

  // 9 and 12 defer to 3, whose own election is still pending.
  h.queue.advance(2_000);
  assert.deepEqual([a9, a12, a3].map((sp) => sp.isCoordinator()), [false, false, false]);

  h.queue.advance(500);
  a3.destroy();
  assert.deepEqual(h.queue.pendingLabels(), ["elect:3:initial", "elect:9:failover", "elect:12:failover"]);

  h.queue.advance(120_000);

  assert.equal(a9.isCoordinator(), true);
  assert.equal(a12.isCoordinator(), false);
  assert.deepEqual(h.seen.of("reinforcement.coordinator.elected"), [
    { spawnPointId: 9, strongpointId: "sp.alpha" },
  ]);
  assert.deepEqual(h.queue.pendingLabels(), ["escalation:9"]);
});
