import type { RawData, WebSocket } from "ws";
import type { Logger } from "../server/logger.js";
import type { TranslationPipeline } from "../pipeline/translation-pipeline.js";
import { resolveLanguagePair } from "../domain/languages.js";
import type { LanguageCode, LanguagePair, TranslationOutcome } from "../domain/types.js";

type StartMessage = {
  type: "start";
  src_lang?: string;
  tgt_lang?: string;
};

export type StreamOptions = {
  readonly supportedLanguages: readonly LanguageCode[];
  readonly defaultSourceLanguage: LanguageCode;
  readonly defaultTargetLanguage: LanguageCode;
};

function parseMessage(raw: Buffer): unknown {
  try {
    return JSON.parse(raw.toString("utf8"));
  } catch {
    return undefined;
  }
}

function toBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}

function validateStartMessage(payload: unknown): payload is StartMessage {
  if (!payload || typeof payload !== "object") return false;
  const p = payload as Record<string, unknown>;
  const sourceOk = p.src_lang === undefined || typeof p.src_lang === "string";
  const targetOk = p.tgt_lang === undefined || typeof p.tgt_lang === "string";
  return p.type === "start" && sourceOk && targetOk;
}

/**
 * Push-to-talk socket: a `start` text frame picks the language pair, then
 * every binary frame is one complete clip answered with one WAV frame.
 */
export function wireTranslateSocket(
  ws: WebSocket,
  pipeline: TranslationPipeline,
  logger: Logger,
  opts: StreamOptions,
): void {
  let pair: LanguagePair | undefined;

  const sendJson = (payload: Record<string, unknown>): void => {
    ws.send(JSON.stringify(payload));
  };

  ws.on("message", async (raw, isBinary) => {
    const data = toBuffer(raw);

    if (!isBinary) {
      const msg = parseMessage(data);
      if (!validateStartMessage(msg)) {
        logger.warn("translate stream malformed control frame");
        sendJson({ type: "error", error: "invalid_payload" });
        return;
      }
      const resolved = resolveLanguagePair(msg.src_lang, msg.tgt_lang, {
        supported: opts.supportedLanguages,
        defaultSource: opts.defaultSourceLanguage,
        defaultTarget: opts.defaultTargetLanguage,
      });
      if (!resolved.ok) {
        sendJson({ type: "error", error: "unsupported_language", languages: resolved.unsupported });
        return;
      }
      pair = resolved.pair;
      sendJson({ type: "ready", src_lang: pair.source, tgt_lang: pair.target });
      return;
    }

    if (!pair) {
      sendJson({ type: "error", error: "languages_not_set" });
      return;
    }

    let outcome: TranslationOutcome;
    try {
      outcome = await pipeline.run(data, pair);
    } catch (error) {
      logger.error("translate stream request failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      sendJson({ type: "error", error: "internal_error" });
      return;
    }
    if (ws.readyState !== ws.OPEN) return;
    if (outcome.ok) {
      ws.send(outcome.audio, { binary: true });
      return;
    }
    sendJson({
      type: "error",
      error: outcome.error.kind,
      stage: outcome.failedAt,
      message: outcome.error.message,
    });
  });

  ws.on("error", (err) => {
    logger.warn("translate stream ws error", { error: err.message });
  });
}
