import { DecodeError } from "../domain/errors.js";
import type { AudioClip } from "../domain/types.js";

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export const WAV_HEADER_BYTES = 44;

type SampleCodec = "pcm" | "float";

type WavFormat = {
  readonly codec: SampleCodec;
  readonly channels: number;
  readonly sampleRateHz: number;
  readonly bitsPerSample: number;
};

export function isRiffWave(bytes: Uint8Array): boolean {
  const buf = asBuffer(bytes);
  return (
    buf.length >= 12 &&
    buf.toString("ascii", 0, 4) === "RIFF" &&
    buf.toString("ascii", 8, 12) === "WAVE"
  );
}

export function decodeWav(bytes: Uint8Array): AudioClip {
  const buf = asBuffer(bytes);
  if (!isRiffWave(buf)) {
    throw new DecodeError("input is not a RIFF/WAVE container");
  }

  let format: WavFormat | undefined;
  let data: Buffer | undefined;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const chunkId = buf.toString("ascii", offset, offset + 4);
    const chunkSize = buf.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (chunkId === "fmt ") {
      if (chunkSize < 16 || bodyStart + chunkSize > buf.length) {
        throw new DecodeError("truncated fmt chunk");
      }
      format = readFormat(buf, bodyStart, chunkSize);
    } else if (chunkId === "data" && !data) {
      // Streaming recorders often leave the size unpatched; keep what arrived.
      data = buf.subarray(bodyStart, Math.min(bodyStart + chunkSize, buf.length));
    }

    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  if (!format) throw new DecodeError("missing fmt chunk");
  if (!data) throw new DecodeError("missing data chunk");

  return {
    samples: readSamples(data, format),
    sampleRateHz: format.sampleRateHz,
    channels: format.channels,
  };
}

/** PCM 16-bit little-endian WAV. Samples are clamped to [-1, 1]; NaN becomes silence. */
export function encodeWav(samples: Float32Array, sampleRateHz: number, channels = 1): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const dataSize = samples.length * bytesPerSample;
  const out = Buffer.alloc(WAV_HEADER_BYTES + dataSize);

  out.write("RIFF", 0, "ascii");
  out.writeUInt32LE(36 + dataSize, 4);
  out.write("WAVE", 8, "ascii");
  out.write("fmt ", 12, "ascii");
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  out.writeUInt16LE(channels, 22);
  out.writeUInt32LE(sampleRateHz, 24);
  out.writeUInt32LE(sampleRateHz * blockAlign, 28);
  out.writeUInt16LE(blockAlign, 32);
  out.writeUInt16LE(bytesPerSample * 8, 34);
  out.write("data", 36, "ascii");
  out.writeUInt32LE(dataSize, 40);

  let cursor = WAV_HEADER_BYTES;
  for (const sample of samples) {
    const clamped = Number.isNaN(sample) ? 0 : Math.max(-1, Math.min(1, sample));
    out.writeInt16LE(Math.round(clamped * 32767), cursor);
    cursor += bytesPerSample;
  }
  return out;
}

/** Size of the `data` chunk as declared in a header written by encodeWav. */
export function wavDataSize(bytes: Uint8Array): number {
  const buf = asBuffer(bytes);
  if (buf.length < WAV_HEADER_BYTES || buf.toString("ascii", 36, 40) !== "data") return 0;
  return buf.readUInt32LE(40);
}

function readFormat(buf: Buffer, start: number, size: number): WavFormat {
  let formatTag = buf.readUInt16LE(start);
  const channels = buf.readUInt16LE(start + 2);
  const sampleRateHz = buf.readUInt32LE(start + 4);
  const bitsPerSample = buf.readUInt16LE(start + 14);

  if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 40) throw new DecodeError("truncated WAVE_FORMAT_EXTENSIBLE header");
    // First two bytes of the SubFormat GUID carry the actual format tag.
    formatTag = buf.readUInt16LE(start + 24);
  }

  if (channels < 1) throw new DecodeError("channel count must be at least 1");
  if (sampleRateHz <= 0) throw new DecodeError("sample rate must be positive");

  if (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitsPerSample)) {
    return { codec: "pcm", channels, sampleRateHz, bitsPerSample };
  }
  if (formatTag === WAVE_FORMAT_IEEE_FLOAT && (bitsPerSample === 32 || bitsPerSample === 64)) {
    return { codec: "float", channels, sampleRateHz, bitsPerSample };
  }
  throw new DecodeError(
    `unsupported WAV encoding: format ${formatTag}, ${bitsPerSample} bits per sample`,
  );
}

function readSamples(data: Buffer, format: WavFormat): Float32Array {
  const bytesPerSample = format.bitsPerSample / 8;
  const frameBytes = bytesPerSample * format.channels;
  const frames = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frames * format.channels);

  for (let i = 0; i < samples.length; i += 1) {
    const at = i * bytesPerSample;
    samples[i] = readSample(data, at, format);
  }
  return samples;
}

function readSample(data: Buffer, at: number, format: WavFormat): number {
  if (format.codec === "float") {
    return format.bitsPerSample === 32 ? data.readFloatLE(at) : data.readDoubleLE(at);
  }
  switch (format.bitsPerSample) {
    case 8:
      return (data.readUInt8(at) - 128) / 128;
    case 16:
      return data.readInt16LE(at) / 32768;
    case 24:
      return data.readIntLE(at, 3) / 8388608;
    default:
      return data.readInt32LE(at) / 2147483648;
  }
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
