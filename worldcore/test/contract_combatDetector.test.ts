// worldcore/test/contract_combatDetector.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { CombatDetector } from "../reinforcement/CombatDetector";
import { SimWorld } from "../sim/SimWorld";
import { quietLogs } from "./testUtils";

quietLogs();

function setup(): { world: SimWorld; detector: CombatDetector } {
  const world = new SimWorld(() => 0, "test:detector");
  world.addStrongpoint({ id: "sp.alpha", name: "Alpha Ridge", position: { x: 0, y: 0, z: 0 }, factionKey: "blue" });
  return { world, detector: new CombatDetector(world, 300) };
}

test("[contract] CombatDetector: live hostile inside the radius means combat", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");

  assert.equal(detector.detect("sp.alpha", blue), false);

  // Height is ignored; only the x/z plane counts.
  world.addActor("h1", { x: 299, y: 500, z: 0 }, "red");
  assert.equal(detector.detect("sp.alpha", blue), true);
});

test("[contract] CombatDetector: the radius is exclusive", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");

  world.addActor("edge", { x: 300, y: 0, z: 0 }, "red");
  assert.equal(detector.detect("sp.alpha", blue), false);

  world.addActor("diag", { x: 180, y: 0, z: 239 }, "red"); // 180^2 + 239^2 = 89521
  assert.equal(detector.detect("sp.alpha", blue), true);
});

test("[contract] CombatDetector: friendly, unaligned and dead actors are ignored", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");

  world.addActor("friend", { x: 10, y: 0, z: 10 }, "blue");
  world.addActor("civilian", { x: 10, y: 0, z: 10 }, null);
  const corpse = world.addActor("corpse", { x: 10, y: 0, z: 10 }, "red");
  corpse.kill();

  assert.equal(detector.detect("sp.alpha", blue), false);
});

test("[contract] CombatDetector: factions compare by identity, not by key", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");

  const lookalike = world.addActor("lookalike", { x: 10, y: 0, z: 10 }, null);
  lookalike.faction = { key: "blue" };
  assert.equal(detector.detect("sp.alpha", blue), true);

  // A defending faction that is not the strongpoint's own instance defends nothing.
  assert.equal(detector.detect("sp.alpha", { key: "blue" }), false);
});

test("[contract] CombatDetector: lost, unowned or unknown strongpoints never read as combat", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");
  world.addActor("h1", { x: 10, y: 0, z: 10 }, "red");

  world.setStrongpointFaction("sp.alpha", "red");
  assert.equal(detector.detect("sp.alpha", blue), false);

  world.setStrongpointFaction("sp.alpha", null);
  assert.equal(detector.detect("sp.alpha", blue), false);

  assert.equal(detector.detect("sp.missing", blue), false);
  assert.equal(detector.detect("sp.alpha", null), false);
});

test("[contract] CombatDetector: an unavailable actor registry fails closed", () => {
  const { world, detector } = setup();
  const blue = world.addFaction("blue");
  world.addActor("h1", { x: 10, y: 0, z: 10 }, "red");

  world.actorsAvailable = false;
  assert.equal(detector.detect("sp.alpha", blue), false);
});
