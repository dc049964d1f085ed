import type { Histogram, HistogramBin } from "./Histogram";
import { type HistogramOptions, validateHistogramOptions } from "./HistogramOptions";
import { calculateSteps } from "./niceSteps";

/** Value at percentile `p` (0..100) of an ascending array. */
export function percentile(sorted: ArrayLike<number>, p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(Math.floor((sorted.length * p) / 100), sorted.length - 1);
  return sorted[index];
}

function emptyBins(binCount: number): HistogramBin[] {
  return Array.from({ length: binCount }, () => ({
    start: 0,
    width: 0,
    count: 0,
    andAbove: false,
  }));
}

/**
 * Buckets duration values (nanoseconds) into `options.binCount` bins.
 *
 * The last regular bin ends at `clampMaximum` when set, otherwise at the
 * `clampPercentile` value, otherwise at the maximum; anything beyond
 * lands in the last bin, which is then flagged `andAbove`.
 */
export function buildHistogram(values: ArrayLike<number>, options: HistogramOptions): Histogram {
  validateHistogramOptions(options);

  const sorted = Float64Array.from(values).sort();
  const n = sorted.length;
  if (n === 0) {
    return {
      count: 0,
      minimum: 0,
      maximum: 0,
      average: 0,
      stdDev: 0,
      p50: 0,
      p90: 0,
      p99: 0,
      p999: 0,
      p9999: 0,
      bins: emptyBins(options.binCount),
    };
  }

  let sum = 0;
  for (const x of sorted) sum += x;
  const average = sum / n;
  let squares = 0;
  for (const x of sorted) squares += (x - average) ** 2;

  const minimum = sorted[0];
  let upper = sorted[n - 1];
  if (options.clampPercentile > 0) upper = percentile(sorted, options.clampPercentile);
  if (options.clampMaximum > 0) upper = options.clampMaximum;

  const { start, spacing } = calculateSteps(minimum, upper, options.binCount, options.niceRange);
  const last = options.binCount - 1;
  const counts = new Array<number>(options.binCount).fill(0);
  let overflow = false;
  for (const x of sorted) {
    let k = Math.floor((x - start) / spacing);
    if (k < 0) k = 0;
    if (k > last) {
      k = last;
      overflow = true;
    }
    counts[k]++;
  }

  return {
    count: n,
    minimum,
    maximum: sorted[n - 1],
    average,
    stdDev: Math.sqrt(squares / n),
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p99: percentile(sorted, 99),
    p999: percentile(sorted, 99.9),
    p9999: percentile(sorted, 99.99),
    bins: counts.map((count, i) => ({
      start: start + i * spacing,
      width: spacing,
      count,
      andAbove: i === last && overflow,
    })),
  };
}
