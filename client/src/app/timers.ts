export type CancelTimer = () => void;

export type TimerApi = {
  schedule: (callback: () => void, ms: number) => CancelTimer;
  now: () => number;
};

export const systemTimers: TimerApi = {
  schedule: (callback, ms) => {
    const handle = setTimeout(callback, ms);
    return () => clearTimeout(handle);
  },
  now: () => Date.now()
};
