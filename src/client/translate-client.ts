import { API_SECRET_HEADER } from "../server/auth.js";
import type { LanguageCode, LanguagePair, ModelStatus } from "../domain/types.js";

export type ClientOptions = {
  readonly baseUrl: string;
  readonly apiSecret?: string;
  readonly healthTimeoutMs?: number;
};

export type GatewayHealth =
  | { readonly reachable: false; readonly error: string }
  | {
      readonly reachable: true;
      readonly modelReady: boolean;
      readonly modelStatus?: ModelStatus;
      readonly modelName?: string;
    };

type HealthResponse = {
  ok?: boolean;
  model?: { name?: string; status?: ModelStatus; ready?: boolean };
};

type ErrorResponse = {
  error?: string;
  stage?: string;
  message?: string;
};

type LanguagesResponse = {
  languages?: LanguageCode[];
  defaults?: { source?: LanguageCode; target?: LanguageCode };
};

export class TranslateRequestError extends Error {
  public constructor(
    message: string,
    public readonly status: number,
    public readonly kind?: string,
    public readonly stage?: string,
  ) {
    super(message);
    this.name = "TranslateRequestError";
  }
}

/** Thin HTTP client for a running gateway: posts clips, receives WAV bytes. */
export class TranslateClient {
  private readonly baseUrl: string;

  public constructor(private readonly opts: ClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  public async health(): Promise<GatewayHealth> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.healthTimeoutMs ?? 2000);
    try {
      const response = await fetch(`${this.baseUrl}/health`, { signal: controller.signal });
      if (!response.ok) {
        return { reachable: false, error: `health returned ${response.status}` };
      }
      const body = (await response.json()) as HealthResponse | null;
      return {
        reachable: true,
        modelReady: body?.model?.ready === true,
        modelStatus: body?.model?.status,
        modelName: body?.model?.name,
      };
    } catch (error) {
      return { reachable: false, error: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  public async languages(): Promise<{ languages: LanguageCode[]; defaults?: LanguagesResponse["defaults"] }> {
    const response = await fetch(`${this.baseUrl}/languages`);
    if (!response.ok) {
      throw new TranslateRequestError(`languages failed with ${response.status}`, response.status);
    }
    const body = (await response.json()) as LanguagesResponse;
    return { languages: body.languages ?? [], defaults: body.defaults };
  }

  public async translate(audio: Uint8Array, pair: LanguagePair, filename = "audio.wav"): Promise<Buffer> {
    const form = new FormData();
    form.append("audio", new Blob([audio], { type: "audio/wav" }), filename);
    form.append("src_lang", pair.source);
    form.append("tgt_lang", pair.target);

    const headers: Record<string, string> = {};
    if (this.opts.apiSecret) {
      headers[API_SECRET_HEADER] = this.opts.apiSecret;
    }

    const response = await fetch(`${this.baseUrl}/translate`, {
      method: "POST",
      headers,
      body: form,
    });

    const contentType = response.headers.get("content-type") ?? "";
    if (response.ok && contentType.startsWith("audio/")) {
      const bytes = Buffer.from(await response.arrayBuffer());
      if (bytes.length === 0) {
        throw new TranslateRequestError("gateway returned empty audio", response.status, "empty_output");
      }
      return bytes;
    }

    const text = await response.text();
    let body: ErrorResponse = {};
    try {
      body = JSON.parse(text) as ErrorResponse;
    } catch {
      body = { message: text.slice(0, 300) };
    }
    throw new TranslateRequestError(
      `translation failed with ${response.status}: ${body.message ?? body.error ?? "unknown error"}`,
      response.status,
      body.error,
      body.stage,
    );
  }
}
