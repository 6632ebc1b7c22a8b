import type { IncomingMessage } from "node:http";

type BodySource = Pick<IncomingMessage, "headers"> & AsyncIterable<Buffer | string>;

export class PayloadTooLargeError extends Error {
  public constructor(public readonly limitBytes: number) {
    super(`request body exceeds ${limitBytes} bytes`);
  }
}

export type TranslateRequestPayload = {
  readonly audio: Buffer;
  readonly sourceLanguage?: string;
  readonly targetLanguage?: string;
};

type JsonTranslatePayload = {
  audioBase64: string;
  src_lang?: string;
  tgt_lang?: string;
};

export async function readBody(req: BodySource, maxBytes: number): Promise<Buffer> {
  const declared = Number(req.headers["content-length"] ?? "0");
  if (declared > maxBytes) {
    throw new PayloadTooLargeError(maxBytes);
  }
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks, total);
}

/**
 * Accepts the three request shapes clients send: a multipart form with an
 * `audio` file, a raw `audio/*` or `application/octet-stream` body with
 * languages in the query string, or JSON carrying base64 audio. Returns
 * undefined when no audio can be found.
 */
export async function parseTranslateRequest(
  contentType: string | undefined,
  body: Buffer,
  query: URLSearchParams,
): Promise<TranslateRequestPayload | undefined> {
  const mediaType = (contentType ?? "").split(";")[0]?.trim().toLowerCase() ?? "";

  if (mediaType === "multipart/form-data") {
    return parseMultipart(contentType ?? "", body);
  }

  if (mediaType === "application/json") {
    let payload: unknown;
    try {
      payload = JSON.parse(body.toString("utf8"));
    } catch {
      return undefined;
    }
    if (!validateJsonTranslatePayload(payload)) return undefined;
    const audio = Buffer.from(payload.audioBase64, "base64");
    if (audio.length === 0) return undefined;
    return { audio, sourceLanguage: payload.src_lang, targetLanguage: payload.tgt_lang };
  }

  if (!isRawAudioType(mediaType) || body.length === 0) return undefined;
  return {
    audio: body,
    sourceLanguage: query.get("src_lang") ?? undefined,
    targetLanguage: query.get("tgt_lang") ?? undefined,
  };
}

function isRawAudioType(mediaType: string): boolean {
  return mediaType.startsWith("audio/") || mediaType === "application/octet-stream";
}

async function parseMultipart(
  contentType: string,
  body: Buffer,
): Promise<TranslateRequestPayload | undefined> {
  let form: FormData;
  try {
    form = await new Request("http://localhost/translate", {
      method: "POST",
      headers: { "content-type": contentType },
      body,
    }).formData();
  } catch {
    return undefined;
  }

  const file = form.get("audio");
  if (file === null || typeof file === "string") return undefined;
  const audio = Buffer.from(await file.arrayBuffer());
  if (audio.length === 0) return undefined;

  return {
    audio,
    sourceLanguage: formText(form, "src_lang"),
    targetLanguage: formText(form, "tgt_lang"),
  };
}

function formText(form: FormData, field: string): string | undefined {
  const value = form.get(field);
  return typeof value === "string" ? value : undefined;
}

function validateJsonTranslatePayload(payload: unknown): payload is JsonTranslatePayload {
  if (!payload || typeof payload !== "object") return false;
  const p = payload as Record<string, unknown>;
  const sourceOk = p.src_lang === undefined || typeof p.src_lang === "string";
  const targetOk = p.tgt_lang === undefined || typeof p.tgt_lang === "string";
  return typeof p.audioBase64 === "string" && sourceOk && targetOk;
}
