import type { LanguageCode, LanguagePair } from "./types.js";

export const DEFAULT_SUPPORTED_LANGUAGES: readonly LanguageCode[] = [
  "eng",
  "fra",
  "spa",
  "deu",
  "ita",
  "por",
  "rus",
  "cmn",
  "jpn",
  "kor",
];

const CODE_PATTERN = /^[a-z]{3}$/;

export function isLanguageCodeFormat(value: string): boolean {
  return CODE_PATTERN.test(value);
}

export function parseLanguageList(raw: string): LanguageCode[] {
  const codes = raw
    .split(",")
    .map((code) => code.trim().toLowerCase())
    .filter((code) => code.length > 0);
  return [...new Set(codes)];
}

export type LanguagePairResult =
  | { readonly ok: true; readonly pair: LanguagePair }
  | { readonly ok: false; readonly unsupported: readonly string[] };

export function resolveLanguagePair(
  source: string | undefined,
  target: string | undefined,
  opts: {
    readonly supported: readonly LanguageCode[];
    readonly defaultSource: LanguageCode;
    readonly defaultTarget: LanguageCode;
  },
): LanguagePairResult {
  const resolvedSource = pickCode(source) ?? opts.defaultSource;
  const resolvedTarget = pickCode(target) ?? opts.defaultTarget;
  const unsupported = [resolvedSource, resolvedTarget].filter(
    (code) => !opts.supported.includes(code),
  );
  if (unsupported.length > 0) {
    return { ok: false, unsupported: [...new Set(unsupported)] };
  }
  return { ok: true, pair: { source: resolvedSource, target: resolvedTarget } };
}

function pickCode(value: string | undefined): string | undefined {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : undefined;
}
