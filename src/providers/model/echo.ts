import type { ModelLoader, ModelOutput, SpeechTranslationModel } from "../../domain/providers.js";
import type { LanguageCode } from "../../domain/types.js";

/**
 * Offline stand-in for a speech translation model: hands the input waveform
 * back untouched, alongside a text sequence naming the language pair.
 */
export class EchoSpeechModel implements SpeechTranslationModel {
  public readonly name = "echo-stub";

  public async generate(
    waveform: Float32Array,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<ModelOutput> {
    return [`[${sourceLanguage}->${targetLanguage}]`, Float32Array.from(waveform)];
  }
}

export class EchoModelLoader implements ModelLoader {
  public readonly name = "echo-stub";

  public async load(): Promise<SpeechTranslationModel> {
    return new EchoSpeechModel();
  }
}
