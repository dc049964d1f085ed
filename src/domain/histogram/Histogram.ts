export interface HistogramBin {
  readonly start: number;
  readonly width: number;
  readonly count: number;
  /** Set on the last bin when it also holds values beyond its upper edge. */
  readonly andAbove: boolean;
}

export interface Histogram {
  readonly count: number;
  readonly minimum: number;
  readonly maximum: number;
  readonly average: number;
  readonly stdDev: number;
  readonly p50: number;
  readonly p90: number;
  readonly p99: number;
  readonly p999: number;
  readonly p9999: number;
  readonly bins: readonly HistogramBin[];
}
