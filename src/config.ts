import {
  DEFAULT_SUPPORTED_LANGUAGES,
  isLanguageCodeFormat,
  parseLanguageList,
} from "./domain/languages.js";
import type { LanguageCode } from "./domain/types.js";
import { isLogLevel, type LogLevel } from "./server/logger.js";

export const DEFAULT_MODEL_ID = "facebook/seamless-m4t-v2-large";

export interface AppConfig {
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly modelEndpointUrl?: string;
  readonly modelApiKey?: string;
  readonly modelId: string;
  readonly modelLoadTimeoutMs: number;
  readonly modelPreload: boolean;
  readonly inferenceConcurrency: number;
  readonly numBeams: number;
  readonly maxNewTokens: number;
  readonly supportedLanguages: readonly LanguageCode[];
  readonly defaultSourceLanguage: LanguageCode;
  readonly defaultTargetLanguage: LanguageCode;
  readonly maxUploadBytes: number;
  readonly translateApiSecret?: string;
  readonly translateBaseUrl: string;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const port = Number(env.PORT ?? "8000");
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  const logLevel = env.LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  const modelLoadTimeoutMs = Number(env.MODEL_LOAD_TIMEOUT_MS ?? "120000");
  if (!Number.isFinite(modelLoadTimeoutMs) || modelLoadTimeoutMs < 1000) {
    throw new Error(`Invalid MODEL_LOAD_TIMEOUT_MS: ${env.MODEL_LOAD_TIMEOUT_MS}`);
  }
  const inferenceConcurrency = Number(env.INFERENCE_CONCURRENCY ?? "1");
  if (!Number.isInteger(inferenceConcurrency) || inferenceConcurrency < 1) {
    throw new Error(`Invalid INFERENCE_CONCURRENCY: ${env.INFERENCE_CONCURRENCY}`);
  }
  const numBeams = Number(env.NUM_BEAMS ?? "1");
  if (!Number.isInteger(numBeams) || numBeams < 1) {
    throw new Error(`Invalid NUM_BEAMS: ${env.NUM_BEAMS}`);
  }
  const maxNewTokens = Number(env.MAX_NEW_TOKENS ?? "256");
  if (!Number.isInteger(maxNewTokens) || maxNewTokens < 1) {
    throw new Error(`Invalid MAX_NEW_TOKENS: ${env.MAX_NEW_TOKENS}`);
  }
  const maxUploadBytes = Number(env.MAX_UPLOAD_BYTES ?? String(25 * 1024 * 1024));
  if (!Number.isInteger(maxUploadBytes) || maxUploadBytes < 1024) {
    throw new Error(`Invalid MAX_UPLOAD_BYTES: ${env.MAX_UPLOAD_BYTES}`);
  }

  const supportedLanguages = env.SUPPORTED_LANGUAGES
    ? parseLanguageList(env.SUPPORTED_LANGUAGES)
    : [...DEFAULT_SUPPORTED_LANGUAGES];
  if (supportedLanguages.length === 0 || !supportedLanguages.every(isLanguageCodeFormat)) {
    throw new Error(`Invalid SUPPORTED_LANGUAGES: ${env.SUPPORTED_LANGUAGES}`);
  }
  const defaultSourceLanguage = (env.DEFAULT_SOURCE_LANGUAGE ?? "eng").trim().toLowerCase();
  if (!supportedLanguages.includes(defaultSourceLanguage)) {
    throw new Error(`Invalid DEFAULT_SOURCE_LANGUAGE: ${env.DEFAULT_SOURCE_LANGUAGE ?? "eng"}`);
  }
  const defaultTargetLanguage = (env.DEFAULT_TARGET_LANGUAGE ?? "fra").trim().toLowerCase();
  if (!supportedLanguages.includes(defaultTargetLanguage)) {
    throw new Error(`Invalid DEFAULT_TARGET_LANGUAGE: ${env.DEFAULT_TARGET_LANGUAGE ?? "fra"}`);
  }

  const modelEndpointUrl = nonEmpty(env.MODEL_ENDPOINT_URL);
  if (modelEndpointUrl && !isHttpUrl(modelEndpointUrl)) {
    throw new Error(`Invalid MODEL_ENDPOINT_URL: ${modelEndpointUrl}`);
  }

  return {
    port,
    logLevel,
    modelEndpointUrl,
    modelApiKey: nonEmpty(env.MODEL_API_KEY),
    modelId: nonEmpty(env.MODEL_ID) ?? DEFAULT_MODEL_ID,
    modelLoadTimeoutMs,
    modelPreload: env.MODEL_PRELOAD !== "0" && env.MODEL_PRELOAD !== "false",
    inferenceConcurrency,
    numBeams,
    maxNewTokens,
    supportedLanguages,
    defaultSourceLanguage,
    defaultTargetLanguage,
    maxUploadBytes,
    translateApiSecret: nonEmpty(env.TRANSLATE_API_SECRET),
    translateBaseUrl: nonEmpty(env.TRANSLATE_BASE_URL) ?? `http://localhost:${port}`,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
