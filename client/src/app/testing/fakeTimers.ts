import type { TimerApi } from "../timers.js";

type PendingTimer = {
  id: number;
  dueAt: number;
  callback: () => void;
};

export type FakeTimers = TimerApi & {
  advance: (ms: number) => void;
  pendingCount: () => number;
};

/**
 * Manual clock for timer-driven code. `advance` runs due callbacks in order,
 * including ones scheduled by callbacks that run during the same advance.
 */
export function createFakeTimers(start = 0): FakeTimers {
  let current = start;
  let nextId = 1;
  const pending: PendingTimer[] = [];

  return {
    now: () => current,
    schedule: (callback, ms) => {
      const id = nextId++;
      pending.push({ id, dueAt: current + ms, callback });
      return () => {
        const index = pending.findIndex((timer) => timer.id === id);
        if (index >= 0) pending.splice(index, 1);
      };
    },
    advance: (ms) => {
      const target = current + ms;
      for (;;) {
        pending.sort((a, b) => a.dueAt - b.dueAt || a.id - b.id);
        const next = pending[0];
        if (!next || next.dueAt > target) break;
        pending.shift();
        current = next.dueAt;
        next.callback();
      }
      current = target;
    },
    pendingCount: () => pending.length
  };
}
