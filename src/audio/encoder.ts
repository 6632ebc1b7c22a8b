import { EncodeError } from "../domain/errors.js";
import type { EncodedAudioBytes, TranslatedAudio } from "../domain/types.js";
import { encodeWav, wavDataSize } from "./wav.js";

export const WAV_CONTENT_TYPE = "audio/wav";

export function encode(audio: TranslatedAudio): EncodedAudioBytes {
  const bytes = encodeWav(audio.samples, audio.sampleRateHz, 1);
  if (bytes.length === 0 || wavDataSize(bytes) === 0) {
    throw new EncodeError("serialised audio is empty");
  }
  return bytes;
}
