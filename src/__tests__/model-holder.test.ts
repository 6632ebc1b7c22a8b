import assert from "node:assert/strict";
import test from "node:test";
import type { ModelLoader, SpeechTranslationModel } from "../domain/providers.js";
import { EchoSpeechModel } from "../providers/model/echo.js";
import { ModelHolder } from "../model/model-holder.js";
import { deferred, silentLogger } from "./helpers.js";

class GatedLoader implements ModelLoader {
  public readonly name = "gated-loader";
  public loads = 0;
  public readonly gate = deferred<SpeechTranslationModel>();

  public load(): Promise<SpeechTranslationModel> {
    this.loads += 1;
    return this.gate.promise;
  }
}

class FlakyLoader implements ModelLoader {
  public readonly name = "flaky-loader";
  private attempts = 0;

  public async load(): Promise<SpeechTranslationModel> {
    this.attempts += 1;
    if (this.attempts === 1) {
      throw new Error("weights not downloaded");
    }
    return new EchoSpeechModel();
  }
}

test("concurrent callers share a single load", async () => {
  const loader = new GatedLoader();
  const holder = new ModelHolder(loader, silentLogger());
  assert.equal(holder.status(), "idle");

  const pending = [holder.get(), holder.get(), holder.get()];
  assert.equal(holder.status(), "loading");
  assert.equal(holder.isReady(), false);

  const model = new EchoSpeechModel();
  loader.gate.resolve(model);
  const models = await Promise.all(pending);

  assert.equal(loader.loads, 1);
  assert.equal(holder.loadAttempts, 1);
  assert.ok(models.every((m) => m === model));
  assert.equal(holder.status(), "ready");
  assert.equal(holder.name, "echo-stub");

  assert.equal(await holder.get(), model);
  assert.equal(loader.loads, 1);
});

test("a failed load is reported and retried on the next call", async () => {
  const holder = new ModelHolder(new FlakyLoader(), silentLogger());

  await assert.rejects(holder.get(), /weights not downloaded/);
  assert.equal(holder.status(), "failed");
  assert.equal(holder.lastLoadError, "weights not downloaded");

  const model = await holder.get();
  assert.equal(model.name, "echo-stub");
  assert.equal(holder.loadAttempts, 2);
  assert.equal(holder.status(), "ready");
  assert.equal(holder.lastLoadError, undefined);
});
