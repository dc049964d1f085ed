import { IncompleteBenchmarkError } from "./errors";
import { Timer } from "./Timer";

/**
 * Combines finalized timers, e.g. one per concurrent worker, into one.
 *
 * Laps are concatenated in argument order; the result spans the earliest
 * start to the latest stop. Returns undefined when called with no timers.
 */
export function mergeTimers(...timers: Timer[]): Timer | undefined {
  if (timers.length === 0) return undefined;

  let start = Number.POSITIVE_INFINITY;
  let stop = Number.NEGATIVE_INFINITY;
  const laps: number[] = [];
  for (const timer of timers) {
    if (!timer.isFinalized) throw new IncompleteBenchmarkError();
    for (const lap of timer.laps()) laps.push(lap);
    if (timer.start < start) start = timer.start;
    if (timer.stop > stop) stop = timer.stop;
  }

  return Timer.fromFinalized(laps, start, stop, timers[0].optionsForDerived());
}
