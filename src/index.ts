import { loadConfig } from "./config.js";
import { makeModelLoader } from "./providers/factory.js";
import { makeTranslationRuntime } from "./runtime.js";
import { makeLogger } from "./server/logger.js";
import { startHttpServer } from "./server/http.js";

function main(): void {
  const config = loadConfig(process.env);
  const logger = makeLogger(config.logLevel);
  const runtime = makeTranslationRuntime({
    loader: makeModelLoader(config, logger),
    logger,
    inferenceConcurrency: config.inferenceConcurrency,
  });

  if (config.modelPreload) {
    // Failures are logged by the holder and retried on the first request.
    void runtime.holder.get().catch(() => undefined);
  }

  const server = startHttpServer(config.port, logger, runtime, {
    supportedLanguages: config.supportedLanguages,
    defaultSourceLanguage: config.defaultSourceLanguage,
    defaultTargetLanguage: config.defaultTargetLanguage,
    maxUploadBytes: config.maxUploadBytes,
    apiSecret: config.translateApiSecret,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info("shutdown signal received", { signal });
    server.close((error) => {
      if (error) {
        logger.error("failed to close http server", { error: error.message });
        process.exitCode = 1;
      }
      process.exit();
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();
