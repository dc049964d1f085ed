import type { Histogram } from "./Histogram";
import type { HistogramOptions } from "./HistogramOptions";

export type HistogramBuilder = (values: ArrayLike<number>, options: HistogramOptions) => Histogram;
