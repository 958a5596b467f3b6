import type { Clock } from "../../core/helpers/state.js";

export type ManualClock = {
  clock: Clock;
  set(iso: string): void;
  advanceDays(days: number): void;
};

export function createManualClock(startIso: string): ManualClock {
  let current = new Date(startIso);
  return {
    clock: () => new Date(current.getTime()),
    set(iso) {
      current = new Date(iso);
    },
    advanceDays(days) {
      current = new Date(current.getTime() + days * 24 * 60 * 60 * 1000);
    },
  };
}
