import { once } from "node:events";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { ModelLoader, ModelOutput, SpeechTranslationModel } from "../domain/providers.js";
import type { LanguageCode } from "../domain/types.js";
import { makeLogger, type Logger } from "../server/logger.js";

export function chunk(id: string, body: Buffer, declaredSize = body.length): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, "ascii");
  header.writeUInt32LE(declaredSize, 4);
  const pad = body.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, body, pad]);
}

export function riffWave(...chunks: Buffer[]): Buffer {
  const body = Buffer.concat(chunks);
  const header = Buffer.alloc(12);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(4 + body.length, 4);
  header.write("WAVE", 8, "ascii");
  return Buffer.concat([header, body]);
}

export function fmtBody(opts: {
  format: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
}): Buffer {
  const blockAlign = (opts.channels * opts.bitsPerSample) / 8;
  const body = Buffer.alloc(16);
  body.writeUInt16LE(opts.format, 0);
  body.writeUInt16LE(opts.channels, 2);
  body.writeUInt32LE(opts.sampleRateHz, 4);
  body.writeUInt32LE(opts.sampleRateHz * blockAlign, 8);
  body.writeUInt16LE(blockAlign, 12);
  body.writeUInt16LE(opts.bitsPerSample, 14);
  return body;
}

/** 16-bit PCM WAV from raw integer sample values. */
export function pcm16Wav(samples: readonly number[], sampleRateHz = 16000, channels = 1): Buffer {
  const data = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => data.writeInt16LE(sample, i * 2));
  return riffWave(
    chunk("fmt ", fmtBody({ format: 1, channels, sampleRateHz, bitsPerSample: 16 })),
    chunk("data", data),
  );
}

export function silenceWav(seconds: number, sampleRateHz = 16000): Buffer {
  return pcm16Wav(new Array<number>(Math.round(seconds * sampleRateHz)).fill(0), sampleRateHz);
}

export type ModelCall = {
  samples: number;
  source: LanguageCode;
  target: LanguageCode;
};

export class ScriptedModel implements SpeechTranslationModel {
  public readonly name = "scripted-model";
  public readonly calls: ModelCall[] = [];

  public constructor(
    private readonly respond: (waveform: Float32Array) => ModelOutput | Promise<ModelOutput>,
  ) {}

  public async generate(
    waveform: Float32Array,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<ModelOutput> {
    this.calls.push({ samples: waveform.length, source: sourceLanguage, target: targetLanguage });
    return this.respond(waveform);
  }
}

export class StaticLoader implements ModelLoader {
  public readonly name = "static-loader";
  public loads = 0;

  public constructor(private readonly model: SpeechTranslationModel) {}

  public async load(): Promise<SpeechTranslationModel> {
    this.loads += 1;
    return this.model;
  }
}

export class FailingLoader implements ModelLoader {
  public readonly name = "failing-loader";

  public constructor(private readonly message: string) {}

  public async load(): Promise<SpeechTranslationModel> {
    throw new Error(this.message);
  }
}

export function silentLogger(): Logger {
  return makeLogger("error", () => undefined);
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: makeLogger("debug", (line) => lines.push(line)), lines };
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets every queued microtask and I/O callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function waitFor(predicate: () => boolean, timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const started = Date.now();
    const interval = setInterval(() => {
      if (predicate()) {
        clearInterval(interval);
        resolve();
        return;
      }
      if (Date.now() - started > timeoutMs) {
        clearInterval(interval);
        reject(new Error("timeout waiting for condition"));
      }
    }, 10);
  });
}

export async function listen(server: Server): Promise<string> {
  if (!server.listening) {
    await once(server, "listening");
  }
  const address = server.address() as AddressInfo;
  return `http://127.0.0.1:${address.port}`;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}
