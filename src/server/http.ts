import { createServer, type ServerResponse } from "node:http";
import type { Server } from "node:http";
import { randomUUID } from "node:crypto";
import { URL } from "node:url";
import { WebSocketServer } from "ws";
import { WAV_CONTENT_TYPE } from "../audio/encoder.js";
import { resolveLanguagePair } from "../domain/languages.js";
import type { LanguageCode, PipelineErrorKind } from "../domain/types.js";
import {
  PayloadTooLargeError,
  parseTranslateRequest,
  readBody,
} from "../ingress/translate-http.js";
import { wireTranslateSocket } from "../ingress/translate-stream.js";
import type { TranslationRuntime } from "../runtime.js";
import { hasValidApiSecret } from "./auth.js";
import type { Logger } from "./logger.js";

export const SERVICE_NAME = "live-translate-gateway";

export type GatewayOptions = {
  readonly supportedLanguages: readonly LanguageCode[];
  readonly defaultSourceLanguage: LanguageCode;
  readonly defaultTargetLanguage: LanguageCode;
  readonly maxUploadBytes: number;
  readonly apiSecret?: string;
};

const STATUS_BY_KIND: Record<PipelineErrorKind, number> = {
  decode_error: 422,
  inference_error: 502,
  empty_output: 502,
  encode_error: 500,
};

export function statusForErrorKind(kind: PipelineErrorKind): number {
  return STATUS_BY_KIND[kind];
}

function writeJson(res: ServerResponse, code: number, payload: unknown): void {
  res.statusCode = code;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(payload));
}

export function startHttpServer(
  port: number,
  logger: Logger,
  runtime: TranslationRuntime,
  opts: GatewayOptions,
): Server {
  const { holder, gate, pipeline } = runtime;
  const streamWs = new WebSocketServer({ noServer: true, maxPayload: opts.maxUploadBytes });

  streamWs.on("connection", (ws) => {
    wireTranslateSocket(ws, pipeline, logger.child({ channel: "stream" }), {
      supportedLanguages: opts.supportedLanguages,
      defaultSourceLanguage: opts.defaultSourceLanguage,
      defaultTargetLanguage: opts.defaultTargetLanguage,
    });
  });

  const server = createServer(async (req, res) => {
    const requestId = randomUUID();
    const reqLogger = logger.child({ requestId });
    res.setHeader("x-request-id", requestId);
    try {
      const method = req.method ?? "GET";
      const url = new URL(req.url ?? "/", "http://localhost");
      const pathname = url.pathname;

      if (method === "GET" && pathname === "/health") {
        return writeJson(res, 200, {
          ok: true,
          service: SERVICE_NAME,
          model: {
            name: holder.name,
            status: holder.status(),
            ready: holder.isReady(),
          },
        });
      }

      if (method === "GET" && pathname === "/ready") {
        const ready = holder.isReady();
        return writeJson(res, ready ? 200 : 503, {
          ready,
          status: holder.status(),
          error: ready ? undefined : holder.lastLoadError,
        });
      }

      if (method === "GET" && pathname === "/languages") {
        return writeJson(res, 200, {
          languages: opts.supportedLanguages,
          defaults: { source: opts.defaultSourceLanguage, target: opts.defaultTargetLanguage },
        });
      }

      if (method === "GET" && pathname === "/metrics") {
        return writeJson(res, 200, {
          pipeline: pipeline.metrics(),
          inference: { active: gate.active, queued: gate.queued },
        });
      }

      if (method === "POST" && pathname === "/translate") {
        if (!hasValidApiSecret(req, opts.apiSecret)) {
          return writeJson(res, 403, { error: "forbidden" });
        }
        const body = await readBody(req, opts.maxUploadBytes);
        const payload = await parseTranslateRequest(req.headers["content-type"], body, url.searchParams);
        if (!payload) {
          return writeJson(res, 400, { error: "invalid_payload" });
        }
        const resolved = resolveLanguagePair(payload.sourceLanguage, payload.targetLanguage, {
          supported: opts.supportedLanguages,
          defaultSource: opts.defaultSourceLanguage,
          defaultTarget: opts.defaultTargetLanguage,
        });
        if (!resolved.ok) {
          return writeJson(res, 400, {
            error: "unsupported_language",
            languages: resolved.unsupported,
          });
        }

        const outcome = await pipeline.run(payload.audio, resolved.pair);
        if (!outcome.ok) {
          reqLogger.debug("translate request failed", { kind: outcome.error.kind });
          return writeJson(res, statusForErrorKind(outcome.error.kind), {
            error: outcome.error.kind,
            stage: outcome.failedAt,
            message: outcome.error.message,
          });
        }

        const { source, target } = resolved.pair;
        res.statusCode = 200;
        res.setHeader("content-type", WAV_CONTENT_TYPE);
        res.setHeader("content-length", outcome.audio.length);
        res.setHeader(
          "content-disposition",
          `attachment; filename="translated_${source}_to_${target}.wav"`,
        );
        res.setHeader("x-source-language", source);
        res.setHeader("x-target-language", target);
        res.end(outcome.audio);
        return;
      }

      writeJson(res, 404, { error: "not_found" });
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        return writeJson(res, 413, { error: "payload_too_large", limitBytes: error.limitBytes });
      }
      reqLogger.error("request failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      writeJson(res, 500, { error: "internal_error" });
    }
  });

  server.on("upgrade", (req, socket, head) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (pathname !== "/translate/stream" || !hasValidApiSecret(req, opts.apiSecret)) {
      socket.destroy();
      return;
    }

    streamWs.handleUpgrade(req, socket, head, (ws) => {
      streamWs.emit("connection", ws, req);
    });
  });

  server.on("close", () => {
    streamWs.close();
  });

  server.listen(port, () => {
    logger.info("http server started", { port, streamWsPath: "/translate/stream" });
  });

  return server;
}
