import type { AppConfig } from "../config.js";
import type { Logger } from "../server/logger.js";
import type { ModelLoader } from "../domain/providers.js";
import { EchoModelLoader } from "./model/echo.js";
import { RemoteModelLoader } from "./model/remote.js";

export function makeModelLoader(config: AppConfig, logger: Logger): ModelLoader {
  const loader = config.modelEndpointUrl
    ? new RemoteModelLoader({
        endpointUrl: config.modelEndpointUrl,
        apiKey: config.modelApiKey,
        modelId: config.modelId,
        numBeams: config.numBeams,
        maxNewTokens: config.maxNewTokens,
        loadTimeoutMs: config.modelLoadTimeoutMs,
        logger: logger.child({ component: "model-engine" }),
      })
    : new EchoModelLoader();

  if (!config.modelEndpointUrl) {
    logger.warn("MODEL_ENDPOINT_URL not set; translations will echo the input audio");
  }
  logger.info("model selection", {
    loader: loader.name,
    modelId: config.modelEndpointUrl ? config.modelId : undefined,
    inferenceConcurrency: config.inferenceConcurrency,
  });

  return loader;
}
