/**
 * Monotonic clock. `now()` returns nanoseconds since an arbitrary origin;
 * only the difference between two readings is meaningful.
 */
export interface ClockPort {
  now(): number;
}
