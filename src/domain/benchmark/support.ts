import { defaultClock } from "../../adapters/sys/HrtimeClock";
import { buildHistogram } from "../histogram/buildHistogram";
import { DEFAULT_HISTOGRAM_OPTIONS } from "../histogram/HistogramOptions";
import { InvalidCapacityError } from "./errors";
import type { ResolvedTimerOptions, TimerOptions } from "./TimerOptions";

export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InvalidCapacityError(capacity);
  }
}

export function resolveTimerOptions(options: TimerOptions): ResolvedTimerOptions {
  return {
    clock: options.clock ?? defaultClock(),
    histogramDefaults: options.histogramDefaults ?? DEFAULT_HISTOGRAM_OPTIONS,
    histogramBuilder: options.histogramBuilder ?? buildHistogram,
  };
}

export function clampBelow(values: ArrayLike<number>, min: number): number[] {
  const out = new Array<number>(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = values[i] < min ? min : values[i];
  }
  return out;
}
