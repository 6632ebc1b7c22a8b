import type { ModelOutput } from "../domain/providers.js";

/**
 * Pulls the audio out of whatever shape a generate call returned.
 *
 * A list of plain numbers is the waveform itself. Any other list is a
 * `(text, waveform, ...)` tuple: the audio sits at index 1, or at index 0 when
 * the tuple has a single element. Batched waveforms such as a `(1, n)` tensor
 * are flattened. Returns undefined when the chosen element is not audio.
 */
export function extractWaveform(output: ModelOutput): Float32Array | undefined {
  if (output instanceof Float32Array || output instanceof Float64Array) {
    return toWaveform(output);
  }
  if ("waveform" in output) {
    return toWaveform(output.waveform);
  }
  const items: readonly unknown[] = output;
  if (isNumberList(items)) {
    return Float32Array.from(items);
  }
  return toWaveform(items.length >= 2 ? items[1] : items[0]);
}

/** Structural check for JSON decoded from a remote engine. */
export function isModelOutput(value: unknown): value is ModelOutput {
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    return items.every((item) => typeof item === "number" || isNumberTensor(item) || isJsonText(item));
  }
  if (!value || typeof value !== "object" || !("waveform" in value)) return false;
  const text = "text" in value ? value.text : undefined;
  return (
    isNumberTensor(value.waveform) && (text === undefined || isJsonText(text) || isNumberTensor(text))
  );
}

function toWaveform(value: unknown): Float32Array | undefined {
  if (value instanceof Float32Array) return value;
  if (value instanceof Float64Array) return Float32Array.from(value);
  if (!Array.isArray(value)) return undefined;
  const flat: number[] = [];
  return flattenInto(value, flat) ? Float32Array.from(flat) : undefined;
}

function flattenInto(items: readonly unknown[], out: number[]): boolean {
  for (const item of items) {
    if (typeof item === "number") {
      out.push(item);
    } else if (item instanceof Float32Array || item instanceof Float64Array) {
      for (const sample of item) out.push(sample);
    } else if (Array.isArray(item)) {
      if (!flattenInto(item, out)) return false;
    } else {
      return false;
    }
  }
  return true;
}

function isNumberList(items: readonly unknown[]): items is readonly number[] {
  return items.every((item) => typeof item === "number");
}

/** Number list nested to any depth; an empty list counts. */
function isNumberTensor(value: unknown): boolean {
  if (!Array.isArray(value)) return false;
  const items: readonly unknown[] = value;
  return items.every((item) => typeof item === "number" || isNumberTensor(item));
}

function isJsonText(value: unknown): value is string | string[] {
  if (typeof value === "string") return true;
  if (!Array.isArray(value)) return false;
  const items: readonly unknown[] = value;
  return items.length > 0 && items.every((item) => typeof item === "string");
}
