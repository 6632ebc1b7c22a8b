import { setTimeout as sleep } from "node:timers/promises";
import type { ModelLoader, ModelOutput, SpeechTranslationModel } from "../../domain/providers.js";
import { MODEL_SAMPLE_RATE_HZ, type LanguageCode } from "../../domain/types.js";
import { errorMessage } from "../../domain/errors.js";
import { isModelOutput } from "../../model/output.js";
import type { Logger } from "../../server/logger.js";

export type RemoteModelOptions = {
  readonly endpointUrl: string;
  readonly apiKey?: string;
  readonly modelId: string;
  readonly numBeams: number;
  readonly maxNewTokens: number;
  readonly loadTimeoutMs: number;
  readonly logger: Logger;
  readonly pollIntervalMs?: number;
  readonly probeTimeoutMs?: number;
};

type EngineHealthResponse = {
  model_loaded?: boolean;
  ready?: boolean;
  device?: string;
};

type EngineGenerateResponse = {
  output?: unknown;
  error?: string;
};

/**
 * Waits for an HTTP inference engine (for example a GPU sidecar serving
 * SeamlessM4T) to report its model loaded. The engine owns the weights; this
 * process only holds the connection details.
 */
export class RemoteModelLoader implements ModelLoader {
  public readonly name = "remote-engine";

  public constructor(private readonly opts: RemoteModelOptions) {}

  public async load(): Promise<SpeechTranslationModel> {
    const deadline = Date.now() + this.opts.loadTimeoutMs;
    const pollIntervalMs = this.opts.pollIntervalMs ?? 1000;
    let lastProblem = "no response";

    for (;;) {
      const probe = await this.probe();
      if (probe.ready) {
        this.opts.logger.info("model engine ready", {
          endpoint: this.opts.endpointUrl,
          model: this.opts.modelId,
          device: probe.device,
        });
        return new RemoteSpeechModel(this.opts);
      }
      lastProblem = probe.problem;
      if (Date.now() + pollIntervalMs > deadline) break;
      this.opts.logger.debug("model engine not ready yet", { problem: lastProblem });
      await sleep(pollIntervalMs);
    }

    throw new Error(
      `model engine at ${this.opts.endpointUrl} not ready after ${this.opts.loadTimeoutMs} ms: ${lastProblem}`,
    );
  }

  private async probe(): Promise<
    { ready: true; device?: string } | { ready: false; problem: string }
  > {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.probeTimeoutMs ?? 2000);
    try {
      const response = await fetch(engineUrl(this.opts.endpointUrl, "health"), {
        method: "GET",
        signal: controller.signal,
        headers: makeHeaders(this.opts.apiKey),
      });
      if (!response.ok) return { ready: false, problem: `health returned ${response.status}` };
      const body = (await response.json()) as EngineHealthResponse;
      if (body.model_loaded === true || body.ready === true) {
        return { ready: true, device: body.device };
      }
      return { ready: false, problem: "model still loading" };
    } catch (error) {
      return { ready: false, problem: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}

export class RemoteSpeechModel implements SpeechTranslationModel {
  public readonly name: string;

  public constructor(private readonly opts: RemoteModelOptions) {
    this.name = `remote:${opts.modelId}`;
  }

  public async generate(
    waveform: Float32Array,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
  ): Promise<ModelOutput> {
    const audio = Buffer.from(waveform.buffer, waveform.byteOffset, waveform.byteLength);
    // No abort signal: generation runs to completion once submitted.
    const response = await fetch(engineUrl(this.opts.endpointUrl, "generate"), {
      method: "POST",
      headers: { ...makeHeaders(this.opts.apiKey), "content-type": "application/json" },
      body: JSON.stringify({
        model: this.opts.modelId,
        audio: audio.toString("base64"),
        audio_format: "f32le",
        sampling_rate: MODEL_SAMPLE_RATE_HZ,
        src_lang: sourceLanguage,
        tgt_lang: targetLanguage,
        generate_speech: true,
        num_beams: this.opts.numBeams,
        max_new_tokens: this.opts.maxNewTokens,
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`engine responded ${response.status}: ${text.slice(0, 300)}`);
    }

    const body = (await response.json()) as EngineGenerateResponse;
    if (body.error) {
      throw new Error(`engine error: ${body.error}`);
    }
    if (!isModelOutput(body.output)) {
      throw new Error("engine returned a malformed output payload");
    }
    return body.output;
  }
}

function engineUrl(endpointUrl: string, path: string): string {
  return `${endpointUrl.replace(/\/+$/, "")}/${path}`;
}

function makeHeaders(apiKey: string | undefined): Record<string, string> {
  const headers: Record<string, string> = { accept: "application/json" };
  if (apiKey) {
    headers.authorization = `Bearer ${apiKey}`;
  }
  return headers;
}
