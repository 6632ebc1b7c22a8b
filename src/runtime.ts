import type { ModelLoader } from "./domain/providers.js";
import { InferenceGate } from "./model/inference-gate.js";
import { TranslationInvoker } from "./model/invoker.js";
import { ModelHolder } from "./model/model-holder.js";
import { TranslationPipeline } from "./pipeline/translation-pipeline.js";
import type { Logger } from "./server/logger.js";

export type TranslationRuntime = {
  readonly holder: ModelHolder;
  readonly gate: InferenceGate;
  readonly pipeline: TranslationPipeline;
};

export function makeTranslationRuntime(opts: {
  readonly loader: ModelLoader;
  readonly logger: Logger;
  readonly inferenceConcurrency?: number;
}): TranslationRuntime {
  const holder = new ModelHolder(opts.loader, opts.logger.child({ component: "model" }));
  const gate = new InferenceGate(opts.inferenceConcurrency ?? 1);
  const invoker = new TranslationInvoker({ holder, gate, logger: opts.logger });
  const pipelineLogger = opts.logger.child({ component: "pipeline" });
  const pipeline = new TranslationPipeline({
    logger: pipelineLogger,
    translator: invoker,
    onStateChange: (state, pair) =>
      pipelineLogger.debug("pipeline state", { state, source: pair.source, target: pair.target }),
  });
  return { holder, gate, pipeline };
}
