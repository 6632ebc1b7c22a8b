import type { PipelineErrorKind } from "./types.js";

export abstract class PipelineError extends Error {
  public abstract readonly kind: PipelineErrorKind;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends PipelineError {
  public readonly kind = "decode_error";
}

export class InferenceError extends PipelineError {
  public readonly kind = "inference_error";
}

/** The model returned audio with zero samples; never a valid translation. */
export class EmptyOutputError extends PipelineError {
  public readonly kind = "empty_output";
}

export class EncodeError extends PipelineError {
  public readonly kind = "encode_error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
