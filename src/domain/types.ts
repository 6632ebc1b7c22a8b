export const MODEL_SAMPLE_RATE_HZ = 16000;

export type LanguageCode = string;

export interface LanguagePair {
  readonly source: LanguageCode;
  readonly target: LanguageCode;
}

/** Interleaved samples in [-1, 1]; `samples.length` is a multiple of `channels`. */
export interface AudioClip {
  readonly samples: Float32Array;
  readonly sampleRateHz: number;
  readonly channels: number;
}

export interface NormalizedAudio extends AudioClip {
  readonly sampleRateHz: typeof MODEL_SAMPLE_RATE_HZ;
  readonly channels: 1;
}

export interface TranslatedAudio {
  readonly samples: Float32Array;
  readonly sampleRateHz: typeof MODEL_SAMPLE_RATE_HZ;
}

export type EncodedAudioBytes = Buffer;

export type PipelineState =
  | "received"
  | "decoding"
  | "normalizing"
  | "translating"
  | "encoding"
  | "completed"
  | "failed";

export type PipelineErrorKind = "decode_error" | "inference_error" | "empty_output" | "encode_error";

export interface StageLatencies {
  readonly decodeMs?: number;
  readonly normalizeMs?: number;
  readonly translateMs?: number;
  readonly encodeMs?: number;
  readonly totalMs?: number;
}

export type TranslationOutcome =
  | {
      readonly ok: true;
      readonly audio: EncodedAudioBytes;
      readonly pair: LanguagePair;
      readonly states: readonly PipelineState[];
      readonly latencies: StageLatencies;
    }
  | {
      readonly ok: false;
      readonly error: { readonly kind: PipelineErrorKind; readonly message: string };
      readonly failedAt: PipelineState;
      readonly pair: LanguagePair;
      readonly states: readonly PipelineState[];
      readonly latencies: StageLatencies;
    };

export interface PipelineMetrics {
  readonly requests: number;
  readonly completed: number;
  readonly inFlight: number;
  readonly failures: Readonly<Record<PipelineErrorKind, number>>;
  readonly lastLatencies?: StageLatencies;
}

export type ModelStatus = "idle" | "loading" | "ready" | "failed";
