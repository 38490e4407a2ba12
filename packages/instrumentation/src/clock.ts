import { wholeMicros } from "@screenflow/metrics-io";

/** Monotonic time source in whole microseconds. */
export type MonotonicClock = () => number;

export const monotonicClock: MonotonicClock = () => Math.round(performance.now() * 1000);

/** Wraps a host clock so every reading is a whole microsecond. */
export function truncatingClock(clock: MonotonicClock): MonotonicClock {
  return () => wholeMicros(clock());
}
