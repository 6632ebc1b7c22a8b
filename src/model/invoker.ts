import { EmptyOutputError, InferenceError, errorMessage } from "../domain/errors.js";
import type { SpeechTranslationModel } from "../domain/providers.js";
import {
  MODEL_SAMPLE_RATE_HZ,
  type LanguagePair,
  type NormalizedAudio,
  type TranslatedAudio,
} from "../domain/types.js";
import type { Logger } from "../server/logger.js";
import type { InferenceGate } from "./inference-gate.js";
import type { ModelHolder } from "./model-holder.js";
import { extractWaveform } from "./output.js";

export type InvokerDeps = {
  readonly holder: ModelHolder;
  readonly gate: InferenceGate;
  readonly logger: Logger;
};

export class TranslationInvoker {
  public constructor(private readonly deps: InvokerDeps) {}

  public async translate(audio: NormalizedAudio, pair: LanguagePair): Promise<TranslatedAudio> {
    if (audio.channels !== 1 || audio.sampleRateHz !== MODEL_SAMPLE_RATE_HZ) {
      throw new InferenceError(
        `model expects mono ${MODEL_SAMPLE_RATE_HZ} Hz audio, got ${audio.channels} channel(s) at ${audio.sampleRateHz} Hz`,
      );
    }

    let model: SpeechTranslationModel;
    try {
      model = await this.deps.holder.get();
    } catch (error) {
      throw new InferenceError(`translation model unavailable: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const output = await this.deps.gate.run(async () => {
      try {
        return await model.generate(audio.samples, pair.source, pair.target);
      } catch (error) {
        throw new InferenceError(`model generation failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    });

    const waveform = extractWaveform(output);
    if (!waveform) {
      throw new InferenceError("model returned an unrecognised output shape");
    }
    if (waveform.length === 0) {
      throw new EmptyOutputError("model produced zero-length audio");
    }

    this.deps.logger.debug("model output extracted", {
      model: model.name,
      inputSamples: audio.samples.length,
      outputSamples: waveform.length,
    });
    return { samples: waveform, sampleRateHz: MODEL_SAMPLE_RATE_HZ };
  }
}
