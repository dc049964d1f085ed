export type { ClockPort } from "./ports/sys/ClockPort";
export type { LoggerPort } from "./ports/sys/LoggerPort";
export { HrtimeClock, defaultClock } from "./adapters/sys/HrtimeClock";
export { ConsoleLogger, type ConsoleLoggerOptions, type LogLevel } from "./adapters/sys/ConsoleLogger";

export { Timer } from "./domain/benchmark/Timer";
export type { TimerOptions } from "./domain/benchmark/TimerOptions";
export type { TimerState } from "./domain/benchmark/TimerState";
export { mergeTimers } from "./domain/benchmark/mergeTimers";
export {
  BenchmarkError,
  IncompleteBenchmarkError,
  InvalidCapacityError,
  InvalidHistogramOptionsError,
  StopwatchFullError,
  StopwatchLapError,
} from "./domain/benchmark/errors";
export { Stopwatch } from "./domain/stopwatch/Stopwatch";

export type { Histogram, HistogramBin } from "./domain/histogram/Histogram";
export type { HistogramBuilder } from "./domain/histogram/HistogramBuilder";
export {
  DEFAULT_HISTOGRAM_OPTIONS,
  type HistogramOptions,
  withHistogramOptions,
} from "./domain/histogram/HistogramOptions";
export { buildHistogram, percentile } from "./domain/histogram/buildHistogram";

export { BenchmarkRunner, type Workload } from "./app/BenchmarkRunner";
export { formatDuration, renderHistogram } from "./app/HistogramRenderer";
