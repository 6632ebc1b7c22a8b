import { basename, extname, join } from "node:path";
import type { LanguagePair } from "./domain/types.js";

export function parseFlags(args: string[]): { flags: Record<string, string>; extras: string[] } {
  const flags: Record<string, string> = {};
  const extras: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (!arg.startsWith("--")) {
      extras.push(arg);
      continue;
    }

    const [key = "", maybeValue] = arg.slice(2).split("=", 2);
    if (maybeValue !== undefined) {
      flags[key] = maybeValue;
      continue;
    }

    const next = args[i + 1];
    if (next && !next.startsWith("--")) {
      flags[key] = next;
      i += 1;
    } else {
      flags[key] = "1";
    }
  }

  return { flags, extras };
}

/**
 * `translated_eng_to_fra.wav` for a single clip; with several inputs the
 * clip's own name is appended so outputs do not overwrite each other.
 */
export function translatedFileName(
  inputPath: string,
  pair: LanguagePair,
  opts: { readonly multiple: boolean; readonly outDir?: string },
): string {
  const prefix = `translated_${pair.source}_to_${pair.target}`;
  const stem = basename(inputPath, extname(inputPath));
  const name = opts.multiple ? `${prefix}_${stem}.wav` : `${prefix}.wav`;
  return opts.outDir ? join(opts.outDir, name) : name;
}
