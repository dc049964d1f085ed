import { InvalidHistogramOptionsError } from "../benchmark/errors";

export interface HistogramOptions {
  binCount: number;
  /** Round bin boundaries to 1, 2 or 5 times a power of ten. */
  niceRange: boolean;
  /** Upper boundary of the last regular bin; 0 leaves it unset. */
  clampMaximum: number;
  /** Percentile in [0, 100) used as the upper boundary when clampMaximum is unset; 0 disables it. */
  clampPercentile: number;
}

export const DEFAULT_HISTOGRAM_OPTIONS: Readonly<HistogramOptions> = Object.freeze({
  binCount: 10,
  niceRange: true,
  clampMaximum: 0,
  clampPercentile: 99.9,
});

export function withHistogramOptions(
  base: Readonly<HistogramOptions>,
  overrides: Partial<HistogramOptions>
): HistogramOptions {
  return { ...base, ...overrides };
}

export function validateHistogramOptions(options: HistogramOptions): void {
  if (!Number.isInteger(options.binCount) || options.binCount <= 0) {
    throw new InvalidHistogramOptionsError(
      `binCount must be a positive integer (got ${options.binCount})`
    );
  }
  if (!Number.isFinite(options.clampMaximum) || options.clampMaximum < 0) {
    throw new InvalidHistogramOptionsError(
      `clampMaximum must be a non-negative number (got ${options.clampMaximum})`
    );
  }
  if (
    !Number.isFinite(options.clampPercentile) ||
    options.clampPercentile < 0 ||
    options.clampPercentile >= 100
  ) {
    throw new InvalidHistogramOptionsError(
      `clampPercentile must be in [0, 100) (got ${options.clampPercentile})`
    );
  }
}
