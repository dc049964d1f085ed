import type { ClockPort } from "../../ports/sys/ClockPort";
import type { HistogramBuilder } from "../histogram/HistogramBuilder";
import type { HistogramOptions } from "../histogram/HistogramOptions";

export interface TimerOptions {
  clock?: ClockPort;
  /** Options `histogram()` and `histogramClamp()` start from. */
  histogramDefaults?: Readonly<HistogramOptions>;
  histogramBuilder?: HistogramBuilder;
}

export interface ResolvedTimerOptions {
  clock: ClockPort;
  histogramDefaults: Readonly<HistogramOptions>;
  histogramBuilder: HistogramBuilder;
}
