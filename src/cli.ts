#!/usr/bin/env node

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseFlags, translatedFileName } from "./cli-args.js";
import { TranslateClient, TranslateRequestError } from "./client/translate-client.js";
import { loadConfig, type AppConfig } from "./config.js";
import { resolveLanguagePair } from "./domain/languages.js";
import type { LanguagePair } from "./domain/types.js";
import { makeModelLoader } from "./providers/factory.js";
import { makeTranslationRuntime } from "./runtime.js";
import { makeLogger } from "./server/logger.js";

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    process.stdout.write(`${cliVersion()}\n`);
    return;
  }
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  switch (command) {
    case "serve": {
      await import("./index.js");
      return;
    }
    case "translate": {
      await handleTranslate(rest);
      return;
    }
    case "remote": {
      await handleRemote(rest);
      return;
    }
    case "health": {
      await handleHealth(rest);
      return;
    }
    case "languages": {
      handleLanguages();
      return;
    }
    default: {
      die(`unknown command: ${command}`);
    }
  }
}

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    die(error instanceof Error ? error.message : String(error));
  }
}

function requirePair(flags: Record<string, string>, config: AppConfig): LanguagePair {
  const resolved = resolveLanguagePair(flags.src, flags.tgt, {
    supported: config.supportedLanguages,
    defaultSource: config.defaultSourceLanguage,
    defaultTarget: config.defaultTargetLanguage,
  });
  if (!resolved.ok) {
    die(
      `unsupported language(s): ${resolved.unsupported.join(", ")} ` +
        `(supported: ${config.supportedLanguages.join(", ")})`,
    );
  }
  return resolved.pair;
}

async function handleTranslate(args: string[]): Promise<void> {
  const { flags, extras } = parseFlags(args);
  if (extras.length === 0) {
    die("translate requires at least one input file");
  }

  const config = readConfig();
  const pair = requirePair(flags, config);
  const logger = makeLogger(config.logLevel, (line) => process.stderr.write(`${line}\n`));
  const runtime = makeTranslationRuntime({
    loader: makeModelLoader(config, logger),
    logger,
    inferenceConcurrency: config.inferenceConcurrency,
  });

  const outDir = flags["out-dir"];
  if (outDir) {
    mkdirSync(outDir, { recursive: true });
  }

  let failures = 0;
  for (const input of extras) {
    const outcome = await runtime.pipeline.run(readInput(input), pair);
    if (!outcome.ok) {
      failures += 1;
      process.stderr.write(`[live-translate] ${input}: ${outcome.error.kind} (${outcome.error.message})\n`);
      continue;
    }
    const outPath = translatedFileName(input, pair, { multiple: extras.length > 1, outDir });
    writeFileSync(outPath, outcome.audio);
    process.stdout.write(`${input} -> ${outPath} (${outcome.audio.length} bytes, ${outcome.latencies.totalMs ?? 0} ms)\n`);
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
}

async function handleRemote(args: string[]): Promise<void> {
  const { flags } = parseFlags(args);
  const input = flags.in;
  if (!input) {
    die("remote requires --in FILE");
  }

  const config = readConfig();
  const pair = requirePair(flags, config);
  const client = new TranslateClient({
    baseUrl: flags["base-url"] ?? config.translateBaseUrl,
    apiSecret: flags.secret ?? config.translateApiSecret,
  });

  try {
    const audio = await client.translate(readInput(input), pair, basename(input));
    const outPath = flags.out ?? translatedFileName(input, pair, { multiple: false });
    writeFileSync(outPath, audio);
    process.stdout.write(`${input} -> ${outPath} (${audio.length} bytes)\n`);
  } catch (error) {
    if (error instanceof TranslateRequestError) {
      die(error.stage ? `${error.message} [stage=${error.stage}]` : error.message);
    }
    throw error;
  }
}

async function handleHealth(args: string[]): Promise<void> {
  const { flags } = parseFlags(args);
  const config = readConfig();
  const baseUrl = flags["base-url"] ?? config.translateBaseUrl;
  const health = await new TranslateClient({ baseUrl }).health();

  if (!health.reachable) {
    process.stdout.write(`gateway ${baseUrl}: unreachable (${health.error})\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(
    `gateway ${baseUrl}: reachable, model ${health.modelName ?? "unknown"} ${health.modelStatus ?? "unknown"}\n`,
  );
  if (!health.modelReady) {
    process.exitCode = 2;
  }
}

function handleLanguages(): void {
  const config = readConfig();
  for (const code of config.supportedLanguages) {
    const marks = [
      code === config.defaultSourceLanguage ? "default source" : undefined,
      code === config.defaultTargetLanguage ? "default target" : undefined,
    ].filter((mark): mark is string => mark !== undefined);
    process.stdout.write(marks.length > 0 ? `${code}  (${marks.join(", ")})\n` : `${code}\n`);
  }
}

function readInput(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    die(`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function die(message: string): never {
  process.stderr.write(`[live-translate] ${message}\n`);
  process.stderr.write("[live-translate] run `live-translate help` for usage\n");
  process.exit(1);
}

function printHelp(): void {
  process.stdout.write(`live-translate ${cliVersion()}\n\n`);
  process.stdout.write(`Usage:\n`);
  process.stdout.write(`  live-translate serve\n`);
  process.stdout.write(`  live-translate translate --src eng --tgt fra [--out-dir DIR] FILE...\n`);
  process.stdout.write(`  live-translate remote --src eng --tgt fra --in FILE [--out FILE] [--base-url URL] [--secret SECRET]\n`);
  process.stdout.write(`  live-translate health [--base-url URL]\n`);
  process.stdout.write(`  live-translate languages\n`);
  process.stdout.write(`  live-translate version\n\n`);
  process.stdout.write(`Configuration is read from the environment (PORT, MODEL_ENDPOINT_URL, SUPPORTED_LANGUAGES, ...).\n`);
  process.stdout.write(`Without MODEL_ENDPOINT_URL, translate echoes the input audio.\n`);
}

function cliVersion(): string {
  try {
    const pkgPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const parsed = JSON.parse(readFileSync(pkgPath, "utf8")) as { version?: string };
    return parsed.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

void main(process.argv.slice(2)).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  die(message);
});
