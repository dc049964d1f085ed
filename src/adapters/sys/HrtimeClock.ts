import type { ClockPort } from "../../ports/sys/ClockPort";

export class HrtimeClock implements ClockPort {
  // Readings are relative to construction so they stay exact as doubles.
  private readonly origin = process.hrtime.bigint();

  now(): number {
    return Number(process.hrtime.bigint() - this.origin);
  }
}

let shared: HrtimeClock | null = null;

export function defaultClock(): HrtimeClock {
  if (!shared) shared = new HrtimeClock();
  return shared;
}
