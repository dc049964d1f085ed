export type TimerState = "raw" | "awaiting-close" | "finalized";
