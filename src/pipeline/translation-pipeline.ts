import { decodeAudio, normalize } from "../audio/normalizer.js";
import { encode } from "../audio/encoder.js";
import {
  DecodeError,
  EncodeError,
  InferenceError,
  PipelineError,
  errorMessage,
} from "../domain/errors.js";
import type {
  AudioClip,
  EncodedAudioBytes,
  LanguagePair,
  NormalizedAudio,
  PipelineErrorKind,
  PipelineMetrics,
  PipelineState,
  StageLatencies,
  TranslatedAudio,
  TranslationOutcome,
} from "../domain/types.js";
import type { Logger } from "../server/logger.js";

export interface Translator {
  translate(audio: NormalizedAudio, pair: LanguagePair): Promise<TranslatedAudio>;
}

export type PipelineDeps = {
  readonly logger: Logger;
  readonly translator: Translator;
  readonly onStateChange?: (state: PipelineState, pair: LanguagePair) => void;
};

type StageName = "decoding" | "normalizing" | "translating" | "encoding";

const LATENCY_FIELD: Record<StageName, keyof StageLatencies> = {
  decoding: "decodeMs",
  normalizing: "normalizeMs",
  translating: "translateMs",
  encoding: "encodeMs",
};

/** Error kind reported when a stage throws something outside the taxonomy. */
const FALLBACK_KIND: Record<StageName, (message: string, cause: unknown) => PipelineError> = {
  decoding: (message, cause) => new DecodeError(message, { cause }),
  normalizing: (message, cause) => new DecodeError(message, { cause }),
  translating: (message, cause) => new InferenceError(message, { cause }),
  encoding: (message, cause) => new EncodeError(message, { cause }),
};

class StageFailure extends Error {
  public constructor(
    public readonly stage: StageName,
    public readonly error: PipelineError,
  ) {
    super(error.message);
  }
}

/**
 * decode → normalize → translate → encode, strictly in that order. Single
 * attempt: the first failing stage ends the request with its own error kind.
 */
export class TranslationPipeline {
  private requests = 0;
  private completed = 0;
  private inFlight = 0;
  private readonly failures: Record<PipelineErrorKind, number> = {
    decode_error: 0,
    inference_error: 0,
    empty_output: 0,
    encode_error: 0,
  };
  private lastLatencies: StageLatencies | undefined;

  public constructor(private readonly deps: PipelineDeps) {}

  public async run(rawBytes: Uint8Array, pair: LanguagePair): Promise<TranslationOutcome> {
    const states: PipelineState[] = [];
    const latencies: { -readonly [K in keyof StageLatencies]: StageLatencies[K] } = {};
    const startedAt = Date.now();
    const enter = (state: PipelineState): void => {
      states.push(state);
      this.deps.onStateChange?.(state, pair);
    };

    const stage = async <T>(name: StageName, work: () => T | Promise<T>): Promise<T> => {
      enter(name);
      const stageStart = Date.now();
      try {
        return await work();
      } catch (error) {
        const typed =
          error instanceof PipelineError ? error : FALLBACK_KIND[name](errorMessage(error), error);
        throw new StageFailure(name, typed);
      } finally {
        latencies[LATENCY_FIELD[name]] = Date.now() - stageStart;
      }
    };

    this.requests += 1;
    this.inFlight += 1;
    enter("received");

    try {
      const clip = await stage<AudioClip>("decoding", () => decodeAudio(rawBytes));
      const normalized = await stage<NormalizedAudio>("normalizing", () => normalize(clip));
      const translated = await stage<TranslatedAudio>("translating", () =>
        this.deps.translator.translate(normalized, pair),
      );
      const audio = await stage<EncodedAudioBytes>("encoding", () => encode(translated));

      enter("completed");
      const done: StageLatencies = { ...latencies, totalMs: Date.now() - startedAt };
      this.completed += 1;
      this.lastLatencies = done;
      this.deps.logger.info("translation completed", {
        source: pair.source,
        target: pair.target,
        inputBytes: rawBytes.length,
        outputBytes: audio.length,
        ...done,
      });
      return { ok: true, audio, pair, states, latencies: done };
    } catch (error) {
      if (!(error instanceof StageFailure)) throw error;

      enter("failed");
      const done: StageLatencies = { ...latencies, totalMs: Date.now() - startedAt };
      this.failures[error.error.kind] += 1;
      this.lastLatencies = done;
      this.deps.logger.warn("translation failed", {
        source: pair.source,
        target: pair.target,
        stage: error.stage,
        kind: error.error.kind,
        error: error.error.message,
      });
      return {
        ok: false,
        error: { kind: error.error.kind, message: error.error.message },
        failedAt: error.stage,
        pair,
        states,
        latencies: done,
      };
    } finally {
      this.inFlight -= 1;
    }
  }

  public metrics(): PipelineMetrics {
    return {
      requests: this.requests,
      completed: this.completed,
      inFlight: this.inFlight,
      failures: { ...this.failures },
      lastLatencies: this.lastLatencies,
    };
  }
}
