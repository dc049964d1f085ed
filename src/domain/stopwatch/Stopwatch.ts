import type { ClockPort } from "../../ports/sys/ClockPort";
import {
  IncompleteBenchmarkError,
  StopwatchFullError,
  StopwatchLapError,
} from "../benchmark/errors";
import { assertCapacity, resolveTimerOptions } from "../benchmark/support";
import { Timer } from "../benchmark/Timer";
import type { TimerOptions } from "../benchmark/TimerOptions";
import type { Histogram } from "../histogram/Histogram";

const UNSTARTED = 0;
const RUNNING = 1;
const STOPPED = 2;

/**
 * Lap recorder for laps that may overlap, e.g. in-flight requests.
 *
 * ```ts
 * const sw = new Stopwatch(100);
 * const lap = sw.start();
 * await request();
 * sw.stop(lap);
 * ```
 */
export class Stopwatch {
  readonly capacity: number;

  private readonly starts: Float64Array;
  private readonly stops: Float64Array;
  private readonly status: Uint8Array;
  private readonly options: TimerOptions;
  private readonly clock: ClockPort;
  private nextLap = 0;
  private stopped = 0;
  private waiters: Array<() => void> = [];

  constructor(capacity: number, options: TimerOptions = {}) {
    assertCapacity(capacity);
    this.capacity = capacity;
    this.starts = new Float64Array(capacity);
    this.stops = new Float64Array(capacity);
    this.status = new Uint8Array(capacity);
    this.options = options;
    this.clock = resolveTimerOptions(options).clock;
  }

  get isComplete(): boolean {
    return this.stopped === this.capacity;
  }

  /** Claims the next lap and returns its index. */
  start(): number {
    if (this.nextLap >= this.capacity) {
      throw new StopwatchFullError(this.capacity);
    }
    const lap = this.nextLap++;
    this.status[lap] = RUNNING;
    this.starts[lap] = this.clock.now();
    return lap;
  }

  stop(lap: number): void {
    const now = this.clock.now();
    if (!Number.isInteger(lap) || lap < 0 || lap >= this.capacity) {
      throw new RangeError(`lap ${lap} is out of range [0, ${this.capacity})`);
    }
    if (this.status[lap] === UNSTARTED) throw new StopwatchLapError(lap, "not started");
    if (this.status[lap] === STOPPED) throw new StopwatchLapError(lap, "already stopped");

    this.stops[lap] = now;
    this.status[lap] = STOPPED;
    this.stopped++;
    if (this.isComplete) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** Resolves once every lap has been stopped. */
  wait(): Promise<void> {
    if (this.isComplete) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(() => resolve());
    });
  }

  laps(): number[] {
    this.mustBeCompleted();
    const out = new Array<number>(this.capacity);
    for (let i = 0; i < this.capacity; i++) {
      out[i] = this.stops[i] - this.starts[i];
    }
    return out;
  }

  elapsed(): number {
    return this.toTimer().elapsed();
  }

  histogram(binCount: number): Histogram {
    return this.toTimer().histogram(binCount);
  }

  histogramClamp(binCount: number, min: number, max: number): Histogram {
    return this.toTimer().histogramClamp(binCount, min, max);
  }

  /** Finalized Timer holding the same laps, for use with `mergeTimers`. */
  toTimer(): Timer {
    this.mustBeCompleted();
    let start = Number.POSITIVE_INFINITY;
    let stop = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < this.capacity; i++) {
      if (this.starts[i] < start) start = this.starts[i];
      if (this.stops[i] > stop) stop = this.stops[i];
    }
    return Timer.fromFinalized(this.laps(), start, stop, this.options);
  }

  private mustBeCompleted(): void {
    if (!this.isComplete) throw new IncompleteBenchmarkError();
  }
}
