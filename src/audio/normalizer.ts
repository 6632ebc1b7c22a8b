import { DecodeError, errorMessage } from "../domain/errors.js";
import { MODEL_SAMPLE_RATE_HZ, type AudioClip, type NormalizedAudio } from "../domain/types.js";
import { decodeWav } from "./wav.js";

export function decodeAudio(bytes: Uint8Array): AudioClip {
  if (bytes.length === 0) {
    throw new DecodeError("input audio is empty");
  }
  try {
    return decodeWav(bytes);
  } catch (error) {
    if (error instanceof DecodeError) throw error;
    throw new DecodeError(`could not parse audio container: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Brings a clip to the only shape the model accepts: one channel at 16 kHz.
 * A clip already in that shape is returned with its sample array untouched.
 */
export function normalize(clip: AudioClip): NormalizedAudio {
  assertValidClip(clip);

  const mono = clip.channels > 1 ? downmix(clip.samples, clip.channels) : clip.samples;
  const samples =
    clip.sampleRateHz === MODEL_SAMPLE_RATE_HZ
      ? mono
      : resample(mono, clip.sampleRateHz, MODEL_SAMPLE_RATE_HZ);

  return { samples, sampleRateHz: MODEL_SAMPLE_RATE_HZ, channels: 1 };
}

/** Arithmetic mean of every channel, frame by frame. */
export function downmix(interleaved: Float32Array, channels: number): Float32Array {
  const frames = Math.floor(interleaved.length / channels);
  const out = new Float32Array(frames);
  for (let frame = 0; frame < frames; frame += 1) {
    let sum = 0;
    const base = frame * channels;
    for (let channel = 0; channel < channels; channel += 1) {
      sum += interleaved[base + channel] ?? 0;
    }
    out[frame] = sum / channels;
  }
  return out;
}

/** Linear interpolation; output length is ceil(n * toHz / fromHz). */
export function resample(samples: Float32Array, fromHz: number, toHz: number): Float32Array {
  if (fromHz === toHz || samples.length === 0) return samples;

  const outLength = Math.ceil((samples.length * toHz) / fromHz);
  const out = new Float32Array(outLength);
  const step = fromHz / toHz;
  const last = samples.length - 1;

  for (let i = 0; i < outLength; i += 1) {
    const position = i * step;
    const left = Math.min(Math.floor(position), last);
    const right = Math.min(left + 1, last);
    const fraction = position - left;
    const a = samples[left] ?? 0;
    const b = samples[right] ?? 0;
    out[i] = a + (b - a) * fraction;
  }
  return out;
}

function assertValidClip(clip: AudioClip): void {
  if (!Number.isInteger(clip.channels) || clip.channels < 1) {
    throw new DecodeError(`invalid channel count: ${clip.channels}`);
  }
  if (!Number.isFinite(clip.sampleRateHz) || clip.sampleRateHz <= 0) {
    throw new DecodeError(`invalid sample rate: ${clip.sampleRateHz}`);
  }
  if (clip.samples.length % clip.channels !== 0) {
    throw new DecodeError("sample count is not a whole number of frames");
  }
}
