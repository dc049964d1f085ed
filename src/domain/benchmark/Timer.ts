import type { ClockPort } from "../../ports/sys/ClockPort";
import type { Histogram } from "../histogram/Histogram";
import type { HistogramBuilder } from "../histogram/HistogramBuilder";
import { type HistogramOptions, withHistogramOptions } from "../histogram/HistogramOptions";
import { IncompleteBenchmarkError } from "./errors";
import { assertCapacity, clampBelow, resolveTimerOptions } from "./support";
import type { TimerOptions } from "./TimerOptions";
import type { TimerState } from "./TimerState";

/**
 * Records a fixed number of laps against a monotonic clock.
 *
 * ```ts
 * const timer = new Timer(1000);
 * while (timer.next()) {
 *   work();
 * }
 * const hist = timer.histogram(10);
 * ```
 *
 * Each `next()` that returns true opens a lap; the call that returns false
 * closes the last one and converts the recorded timestamps into durations.
 */
export class Timer {
  readonly capacity: number;

  private readonly samples: Float64Array;
  private readonly clock: ClockPort;
  private readonly histogramDefaults: Readonly<HistogramOptions>;
  private readonly histogramBuilder: HistogramBuilder;
  private cursor = 0;
  private startedAt = 0;
  private stoppedAt = 0;
  private current: TimerState = "raw";

  constructor(capacity: number, options: TimerOptions = {}) {
    assertCapacity(capacity);
    const resolved = resolveTimerOptions(options);
    this.capacity = capacity;
    this.samples = new Float64Array(capacity);
    this.clock = resolved.clock;
    this.histogramDefaults = resolved.histogramDefaults;
    this.histogramBuilder = resolved.histogramBuilder;
  }

  /** @internal Builds a timer that already holds finalized laps. */
  static fromFinalized(
    laps: ArrayLike<number>,
    start: number,
    stop: number,
    options: TimerOptions = {}
  ): Timer {
    const timer = new Timer(laps.length, options);
    timer.samples.set(laps);
    timer.cursor = laps.length;
    timer.startedAt = start;
    timer.stoppedAt = stop;
    timer.current = "finalized";
    return timer;
  }

  get state(): TimerState {
    return this.current;
  }

  get isFinalized(): boolean {
    return this.current === "finalized";
  }

  /** Laps recorded so far. */
  get count(): number {
    return this.cursor;
  }

  get start(): number {
    return this.startedAt;
  }

  get stop(): number {
    return this.stoppedAt;
  }

  /**
   * Starts the next lap. Returns false once every lap has been measured;
   * the timestamp read on that call closes the final lap.
   */
  next(): boolean {
    const now = this.clock.now();
    if (this.cursor < this.capacity) {
      this.samples[this.cursor] = now;
      this.cursor++;
      if (this.cursor === this.capacity) {
        this.current = "awaiting-close";
      }
      return true;
    }
    this.finalize(now);
    return false;
  }

  laps(): number[] {
    this.mustBeCompleted();
    return Array.from(this.samples);
  }

  elapsed(): number {
    this.mustBeCompleted();
    return this.stoppedAt - this.startedAt;
  }

  /**
   * Histogram of all laps using the timer's default options, which put the
   * last bucket at the 99.9th percentile unless configured otherwise.
   */
  histogram(binCount: number): Histogram {
    this.mustBeCompleted();
    return this.histogramBuilder(
      this.samples,
      withHistogramOptions(this.histogramDefaults, { binCount })
    );
  }

  /**
   * Histogram with laps shorter than `min` raised to `min` and the last
   * bucket starting at `max`.
   */
  histogramClamp(binCount: number, min: number, max: number): Histogram {
    this.mustBeCompleted();
    return this.histogramBuilder(
      clampBelow(this.samples, min),
      withHistogramOptions(this.histogramDefaults, {
        binCount,
        clampMaximum: max,
        clampPercentile: 0,
      })
    );
  }

  /** @internal */
  optionsForDerived(): TimerOptions {
    return {
      clock: this.clock,
      histogramDefaults: this.histogramDefaults,
      histogramBuilder: this.histogramBuilder,
    };
  }

  private mustBeCompleted(): void {
    if (this.current !== "finalized") {
      throw new IncompleteBenchmarkError();
    }
  }

  private finalize(last: number): void {
    if (this.current === "finalized") return;

    const t = this.samples;
    const end = t.length - 1;
    this.startedAt = t[0];
    for (let i = 0; i < end; i++) {
      t[i] = t[i + 1] - t[i];
    }
    t[end] = last - t[end];
    this.stoppedAt = last;
    this.current = "finalized";
  }
}
