import type { ModelLoader, SpeechTranslationModel } from "../domain/providers.js";
import type { ModelStatus } from "../domain/types.js";
import type { Logger } from "../server/logger.js";
import { errorMessage } from "../domain/errors.js";

/**
 * Process-wide model slot. The first caller starts the load; everyone arriving
 * while it runs awaits the same promise, so the loader runs at most once per
 * successful initialisation. A failed load clears the slot and the next call
 * starts a fresh attempt.
 */
export class ModelHolder {
  private pending: Promise<SpeechTranslationModel> | undefined;
  private model: SpeechTranslationModel | undefined;
  private lastError: string | undefined;
  private loads = 0;

  public constructor(
    private readonly loader: ModelLoader,
    private readonly logger: Logger,
  ) {}

  public get name(): string {
    return this.model?.name ?? this.loader.name;
  }

  public get loadAttempts(): number {
    return this.loads;
  }

  public isReady(): boolean {
    return this.model !== undefined;
  }

  public status(): ModelStatus {
    if (this.model) return "ready";
    if (this.pending) return "loading";
    return this.lastError ? "failed" : "idle";
  }

  public get lastLoadError(): string | undefined {
    return this.lastError;
  }

  public get(): Promise<SpeechTranslationModel> {
    if (this.model) return Promise.resolve(this.model);
    this.pending ??= this.load().finally(() => {
      this.pending = undefined;
    });
    return this.pending;
  }

  private async load(): Promise<SpeechTranslationModel> {
    this.loads += 1;
    const startedAt = Date.now();
    this.logger.info("loading translation model", { loader: this.loader.name, attempt: this.loads });
    try {
      const model = await this.loader.load();
      this.model = model;
      this.lastError = undefined;
      this.logger.info("translation model ready", {
        model: model.name,
        loadMs: Date.now() - startedAt,
      });
      return model;
    } catch (error) {
      this.lastError = errorMessage(error);
      this.logger.error("translation model failed to load", {
        loader: this.loader.name,
        error: this.lastError,
      });
      throw error;
    }
  }
}
