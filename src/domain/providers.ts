import type { LanguageCode } from "./types.js";

/** Nested number lists, as a `(batch, samples)` tensor arrives over JSON. */
export type NumberTensor = number | readonly NumberTensor[];

export type ModelWaveform = Float32Array | Float64Array | readonly NumberTensor[];

/** Decoded text or raw token ids; never audio. */
export type TextSequence = string | readonly string[] | Int32Array | readonly number[];

/**
 * What a generate call may hand back: a bare waveform, a `(text, waveform)`
 * tuple, or a record with a named `waveform` field.
 */
export type ModelOutput =
  | ModelWaveform
  | readonly (ModelWaveform | TextSequence)[]
  | { readonly waveform: ModelWaveform; readonly text?: TextSequence };

export interface SpeechTranslationModel {
  readonly name: string;
  generate(
    waveform: Float32Array,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<ModelOutput>;
}

export interface ModelLoader {
  readonly name: string;
  load(): Promise<SpeechTranslationModel>;
}
