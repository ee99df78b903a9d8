// worldcore/test/contract_worldManager.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { WorldManager } from "../world/WorldManager";
import { WorldIntegrityError, WorldLifecycleError } from "../world/WorldErrors";
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from "../config/worldConfig";
import { IdentityAllocator } from "../core/IdentityAllocator";
import { type TestCharacter, TestMap, character, createTestMap, defs, holdOpen } from "./testMaps";

function makeWorld(config: WorldConfig = DEFAULT_WORLD_CONFIG): WorldManager<TestCharacter, TestMap, string> {
  return new WorldManager<TestCharacter, TestMap, string>({
    createPartition: createTestMap,
    config,
  });
}

test("[world] initialize registers maps, then starts the heartbeat", async (t) => {
  const world = makeWorld({ ...DEFAULT_WORLD_CONFIG, heartbeatMs: 10 });
  t.after(() => world.shutdown());

  assert.equal(world.heartbeatState, "uninitialized");
  await world.initialize(defs([1, "Alpha"], [2, "Beta"]));

  assert.equal(world.isInitialized, true);
  assert.equal(world.heartbeatState, "scheduled");
  assert.equal(world.count, 2);
  assert.equal(world.getMap(1)?.name, "Alpha");
  assert.equal(world.getMap("Beta")?.id, 2);
  assert.equal(world.getMap(3), undefined);
  assert.equal(world.getMap("Gamma"), undefined);
});

test("[world] the first beat sees every map", async (t) => {
  const world = makeWorld({ ...DEFAULT_WORLD_CONFIG, heartbeatMs: 10 });
  t.after(() => world.shutdown());

  await world.initialize(defs([1, "Alpha"], [2, "Beta"], [3, "Gamma"]));

  // Gamma is registered last, so by its first tick the whole sweep has run.
  const gamma = world.getMap("Gamma");
  assert.ok(gamma);
  await holdOpen(
    new Promise<void>((resolve) => {
      gamma.onTick = () => resolve();
    })
  );

  for (const name of ["Alpha", "Beta", "Gamma"]) {
    assert.equal(world.getMap(name)?.beats[0]?.beat, 1, `${name} missed beat 1`);
  }
});

test("[world] duplicate definitions abort startup with nothing running", async () => {
  const world = makeWorld();

  await assert.rejects(world.initialize(defs([1, "Alpha"], [1, "Beta"])), WorldIntegrityError);

  assert.equal(world.isInitialized, false);
  assert.equal(world.count, 0);
  assert.equal(world.heartbeatState, "uninitialized");
});

test("[world] initialize twice is a lifecycle error", async (t) => {
  const world = makeWorld();
  t.after(() => world.shutdown());

  await world.initialize(defs([1, "Alpha"]));
  await assert.rejects(world.initialize(defs([2, "Beta"])), WorldLifecycleError);
  assert.equal(world.count, 1);
});

test("[world] a faulty map does not halt the others", async (t) => {
  const world = makeWorld({ ...DEFAULT_WORLD_CONFIG, heartbeatMs: 10 });
  t.after(() => world.shutdown());

  await world.initialize(defs([1, "Broken"], [2, "Healthy"]));

  const broken = world.getMap("Broken");
  const healthy = world.getMap("Healthy");
  assert.ok(broken);
  assert.ok(healthy);

  broken.onTick = () => {
    throw new Error("map fault");
  };
  await holdOpen(
    new Promise<void>((resolve) => {
      healthy.onTick = (beat) => {
        if (beat.beat === 3) resolve();
      };
    })
  );

  assert.ok(broken.beats.length >= 3);
  assert.ok(healthy.beats.length >= 3);
});

test("[world] id helpers draw from separate counters", () => {
  const world = makeWorld();

  assert.equal(world.createHandle(), 1);
  assert.equal(world.createHandle(), 2);
  assert.equal(world.createSessionObjectId(), 0xe1a900000001n);
  assert.equal(world.createSkillObjectId(), 0x54b600000001n);
  assert.equal(world.createSessionObjectId(), 0xe1a900000002n);
});

test("[world] configured id bases are honoured", () => {
  const world = makeWorld({
    heartbeatMs: 500,
    identityBases: { handle: 100n, sessionObject: 5000n, skillObject: 9000n },
  });

  assert.equal(world.createHandle(), 101);
  assert.equal(world.createSessionObjectId(), 5001n);
  assert.equal(world.createSkillObjectId(), 9001n);
});

test("[world] identityBuffer lets another allocator share the counters", () => {
  const world = makeWorld();
  const worker = IdentityAllocator.attach(world.identityBuffer);

  assert.equal(world.createHandle(), 1);
  assert.equal(worker.next("handle"), 2n);
  assert.equal(world.createHandle(), 3);
});

test("[world] character queries and script cleanup forward to every map", async (t) => {
  const world = makeWorld();
  t.after(() => world.shutdown());

  await world.initialize(defs([1, "Alpha"], [2, "Beta"]));

  const a = character("A", "Ravens");
  const b = character("B", "Wolves");
  const c = character("C", "Owls");
  world.getMap(1)?.characters.push(a, b);
  world.getMap(2)?.characters.push(c);

  assert.deepEqual(await world.getCharacters(), [a, b, c]);
  assert.deepEqual(await world.getCharacters((ch) => ch !== b), [a, c]);
  assert.equal(await world.getCharacterByTeamName("Owls"), c);
  assert.equal(await world.getCharacterByTeamName("Bears"), undefined);

  await world.removeScriptedEntities();
  assert.equal(world.getMap(1)?.scriptedRemovals, 1);
  assert.equal(world.getMap(2)?.scriptedRemovals, 1);
});

test("[world] shutdown stops the heartbeat", async () => {
  const world = makeWorld();
  await world.initialize(defs([1, "Alpha"]));

  await world.shutdown();
  assert.equal(world.heartbeatState, "stopped");
});
