import { COUNTDOWN_TICK_MS } from "../constants.js";
import { systemTimers, type CancelTimer, type TimerApi } from "../timers.js";

export type CountdownTicker = {
  stop: () => void;
};

type CountdownTickerOptions = {
  deadline: number;
  onTick: (now: number) => void;
  intervalMs?: number;
  timers?: TimerApi;
};

// Ticks until the deadline has passed, then stops on its own after a final tick.
export function startCountdownTicker({
  deadline,
  onTick,
  intervalMs = COUNTDOWN_TICK_MS,
  timers = systemTimers
}: CountdownTickerOptions): CountdownTicker {
  let cancel: CancelTimer | null = null;
  let stopped = false;

  const scheduleTick = () => {
    cancel = timers.schedule(() => {
      cancel = null;
      if (stopped) return;
      const now = timers.now();
      onTick(now);
      if (now < deadline && !stopped) {
        scheduleTick();
      }
    }, intervalMs);
  };

  if (timers.now() < deadline) {
    scheduleTick();
  }

  return {
    stop: () => {
      stopped = true;
      cancel?.();
      cancel = null;
    }
  };
}
