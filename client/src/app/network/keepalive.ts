import { PING_PAYLOAD } from "../../../../shared/protocol.js";
import { KEEPALIVE_INTERVAL_MS } from "../constants.js";
import { systemTimers, type CancelTimer, type TimerApi } from "../timers.js";
import type { SessionConnection } from "./connection.js";

export type Keepalive = {
  stop: () => void;
};

type KeepaliveOptions = {
  connection: Pick<SessionConnection, "send">;
  onFailure: (error: unknown) => void;
  intervalMs?: number;
  timers?: TimerApi;
};

/**
 * Sends a ping after every interval. The next interval starts once the
 * previous ping has been written. A failed write is reported and ends the
 * loop.
 */
export function startKeepalive({
  connection,
  onFailure,
  intervalMs = KEEPALIVE_INTERVAL_MS,
  timers = systemTimers
}: KeepaliveOptions): Keepalive {
  let stopped = false;
  let cancel: CancelTimer | null = null;

  const ping = () => {
    void connection.send(PING_PAYLOAD).then(
      () => {
        if (!stopped) scheduleNext();
      },
      (error: unknown) => {
        if (stopped) return;
        stopped = true;
        onFailure(error);
      }
    );
  };

  const scheduleNext = () => {
    cancel = timers.schedule(() => {
      cancel = null;
      if (!stopped) ping();
    }, intervalMs);
  };

  scheduleNext();

  return {
    stop: () => {
      stopped = true;
      cancel?.();
      cancel = null;
    }
  };
}
