import assert from "node:assert/strict";
import test from "node:test";
import { WAV_CONTENT_TYPE, encode } from "../audio/encoder.js";
import { decodeWav, wavDataSize } from "../audio/wav.js";
import { EncodeError } from "../domain/errors.js";

test("encode produces a 16 kHz mono WAV the decoder reads back", () => {
  const bytes = encode({ samples: Float32Array.from([0, 0.5, -0.25]), sampleRateHz: 16000 });

  assert.equal(WAV_CONTENT_TYPE, "audio/wav");
  assert.equal(wavDataSize(bytes), 6);

  const clip = decodeWav(bytes);
  assert.equal(clip.sampleRateHz, 16000);
  assert.equal(clip.channels, 1);
  assert.equal(clip.samples.length, 3);
  assert.equal(clip.samples[1], 0.5);
  assert.ok(Math.abs((clip.samples[2] ?? 0) + 0.25) < 1e-3);
});

test("encode refuses to emit a WAV without samples", () => {
  assert.throws(
    () => encode({ samples: new Float32Array(0), sampleRateHz: 16000 }),
    (error: unknown) => error instanceof EncodeError && error.kind === "encode_error",
  );
});
