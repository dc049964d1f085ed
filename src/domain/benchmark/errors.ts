export class BenchmarkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCapacityError extends BenchmarkError {
  constructor(readonly capacity: number) {
    super(`must have count at least 1 (got ${capacity})`);
  }
}

export class IncompleteBenchmarkError extends BenchmarkError {
  constructor() {
    super("benchmarking incomplete");
  }
}

export class InvalidHistogramOptionsError extends BenchmarkError {}

export class StopwatchFullError extends BenchmarkError {
  constructor(readonly capacity: number) {
    super(`all ${capacity} laps have already been started`);
  }
}

export class StopwatchLapError extends BenchmarkError {
  constructor(readonly lap: number, reason: "not started" | "already stopped") {
    super(`lap ${lap} ${reason}`);
  }
}
