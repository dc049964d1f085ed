import { mergeTimers } from "../domain/benchmark/mergeTimers";
import { Timer } from "../domain/benchmark/Timer";
import type { TimerOptions } from "../domain/benchmark/TimerOptions";
import type { HistogramOptions } from "../domain/histogram/HistogramOptions";
import type { ClockPort } from "../ports/sys/ClockPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";

/** One unit of measured work. `worker` is the index of the calling worker. */
export type Workload = (worker: number) => void | Promise<void>;

export interface BenchmarkRunnerDeps {
  clock: ClockPort;
  logger: LoggerPort;
  histogramDefaults: Readonly<HistogramOptions>;
}

export class BenchmarkRunner {
  constructor(private readonly deps: BenchmarkRunnerDeps) {}

  async runSerial(samples: number, work: Workload): Promise<Timer> {
    const timer = new Timer(samples, this.timerOptions());
    this.deps.logger.debug("benchmark started", { samples });
    await this.drive(timer, 0, work);
    this.deps.logger.info("benchmark finished", { samples, elapsedNs: timer.elapsed() });
    return timer;
  }

  /**
   * Drives one timer per worker concurrently and merges them once every
   * worker is done.
   */
  async runConcurrent(workers: number, samplesPerWorker: number, work: Workload): Promise<Timer> {
    if (!Number.isInteger(workers) || workers <= 0) {
      throw new RangeError(`workers must be a positive integer (got ${workers})`);
    }

    const timers = Array.from({ length: workers }, () => new Timer(samplesPerWorker, this.timerOptions()));
    this.deps.logger.debug("concurrent benchmark started", { workers, samplesPerWorker });
    await Promise.all(timers.map((timer, worker) => this.drive(timer, worker, work)));

    const merged = mergeTimers(...timers);
    if (!merged) {
      throw new Error("no timers to merge");
    }
    this.deps.logger.info("concurrent benchmark finished", {
      workers,
      laps: merged.count,
      elapsedNs: merged.elapsed(),
    });
    return merged;
  }

  private async drive(timer: Timer, worker: number, work: Workload): Promise<void> {
    while (timer.next()) {
      const pending = work(worker);
      if (pending) await pending;
    }
  }

  private timerOptions(): TimerOptions {
    return {
      clock: this.deps.clock,
      histogramDefaults: this.deps.histogramDefaults,
    };
  }
}
