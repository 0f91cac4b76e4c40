import type { Clock } from "../domain/runtime/clock";

export const runtimeClock: Clock = {
  now: () => new Date(),
};

/** Strictly increasing ISO timestamps, for hosts whose writes land within one millisecond. */
export function createMonotonicClock(base: Clock = runtimeClock): Clock {
  let last = 0;
  return {
    now: () => {
      const next = Math.max(base.now().getTime(), last + 1);
      last = next;
      return new Date(next);
    },
  };
}
