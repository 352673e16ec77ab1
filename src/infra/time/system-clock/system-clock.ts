import { formatISO } from "date-fns";
import type { Clock } from "@core/ports/clock.types";

// setTimeout overflows above 2^31-1 ms, so long waits re-arm in chunks.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type SystemClockOptions = {
  /** Pending sleeps hold the event loop open only when set. */
  keepProcessAlive?: boolean;
};

export function createSystemClock(options: SystemClockOptions = {}): Clock {
  const keepProcessAlive = options.keepProcessAlive ?? false;

  return {
    nowUnixSeconds() {
      return Math.floor(Date.now() / 1000);
    },
    nowIso() {
      return formatISO(new Date());
    },
    sleepUntil(unixSeconds) {
      return new Promise<void>((resolveSleep) => {
        const tick = () => {
          const remainingMs = unixSeconds * 1000 - Date.now();
          if (remainingMs <= 0) {
            resolveSleep();
            return;
          }
          const timer = setTimeout(tick, Math.min(remainingMs, MAX_TIMER_DELAY_MS));
          if (!keepProcessAlive) {
            timer.unref();
          }
        };
        tick();
      });
    },
  };
}
