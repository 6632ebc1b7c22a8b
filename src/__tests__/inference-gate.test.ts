import assert from "node:assert/strict";
import test from "node:test";
import { InferenceGate } from "../model/inference-gate.js";
import { deferred, flush } from "./helpers.js";

test("capacity one runs tasks one at a time in arrival order", async () => {
  const gate = new InferenceGate();
  const started: string[] = [];
  const releases = [deferred<void>(), deferred<void>(), deferred<void>()];

  const runs = ["a", "b", "c"].map((name, i) =>
    gate.run(async () => {
      started.push(name);
      await releases[i]?.promise;
      return name;
    }),
  );

  await flush();
  assert.deepEqual(started, ["a"]);
  assert.equal(gate.active, 1);
  assert.equal(gate.queued, 2);

  releases[0]?.resolve();
  await flush();
  assert.deepEqual(started, ["a", "b"]);
  assert.equal(gate.queued, 1);

  releases[1]?.resolve();
  releases[2]?.resolve();
  assert.deepEqual(await Promise.all(runs), ["a", "b", "c"]);
  assert.equal(gate.active, 0);
  assert.equal(gate.queued, 0);
});

test("a larger capacity admits that many tasks at once", async () => {
  const gate = new InferenceGate(2);
  const hold = deferred<void>();
  const runs = [1, 2, 3].map(() => gate.run(() => hold.promise));

  await flush();
  assert.equal(gate.active, 2);
  assert.equal(gate.queued, 1);

  hold.resolve();
  await Promise.all(runs);
  assert.equal(gate.active, 0);
});

test("a rejected task releases its slot", async () => {
  const gate = new InferenceGate();

  await assert.rejects(
    gate.run(async () => {
      throw new Error("device lost");
    }),
    /device lost/,
  );
  assert.equal(gate.active, 0);
  assert.equal(await gate.run(async () => "next"), "next");
});

test("capacity must be a positive integer", () => {
  assert.throws(() => new InferenceGate(0), /Invalid inference capacity: 0/);
  assert.throws(() => new InferenceGate(1.5), /Invalid inference capacity: 1.5/);
});
