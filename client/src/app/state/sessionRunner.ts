import { connect as connectWebSocket, type SessionConnection } from "../network/connection.js";
import { decodeNext } from "../network/decodeNext.js";
import { describeError } from "../network/errors.js";
import { startKeepalive, type Keepalive } from "../network/keepalive.js";
import { startCountdownTicker, type CountdownTicker } from "../round/countdownTicker.js";
import { systemTimers, type TimerApi } from "../timers.js";
import type { SessionEffect, SessionEvent } from "./actions.js";
import { createInitialSessionState, sessionReducer } from "./sessionReducer.js";
import type { SessionState } from "./types.js";

export type SessionListener = (state: SessionState) => void;

export type SessionRunnerOptions = {
  serverUrl: string;
  connect?: (url: string) => Promise<SessionConnection>;
  timers?: TimerApi;
  keepaliveIntervalMs?: number;
  onQuit?: () => void;
};

/**
 * Owns the live session: feeds events through the reducer one at a time and
 * runs the effects it returns. Events raised while an event is being applied
 * are queued, so state only ever changes here and in arrival order.
 */
export class SessionRunner {
  private state: SessionState;
  private readonly listeners = new Set<SessionListener>();
  private readonly queue: SessionEvent[] = [];
  private readonly connect: (url: string) => Promise<SessionConnection>;
  private readonly timers: TimerApi;
  private readonly keepaliveIntervalMs: number | undefined;
  private readonly onQuit: () => void;
  private isDispatching = false;
  private isStopped = false;
  private isReading = false;
  private ticker: CountdownTicker | null = null;
  private keepalive: Keepalive | null = null;

  constructor(options: SessionRunnerOptions) {
    this.connect = options.connect ?? connectWebSocket;
    this.timers = options.timers ?? systemTimers;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs;
    this.onQuit = options.onQuit ?? (() => undefined);
    this.state = createInitialSessionState({
      serverUrl: options.serverUrl,
      now: this.timers.now()
    });
  }

  getState = (): SessionState => this.state;

  subscribe = (listener: SessionListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  start(): void {
    this.dispatch({ type: "session/start" });
  }

  dispatch = (event: SessionEvent): void => {
    if (this.isStopped) return;
    this.queue.push(event);
    if (this.isDispatching) return;

    this.isDispatching = true;
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        if (this.isStopped) break;
        // A throwing listener or effect must not strand the events queued behind it.
        try {
          this.apply(next);
        } catch (error) {
          console.error(`[session] failed to apply ${next.type}`, error);
        }
      }
    } finally {
      this.isDispatching = false;
      if (this.isStopped) this.queue.length = 0;
    }
  };

  private apply(event: SessionEvent) {
    const transition = sessionReducer(this.state, event);
    const changed = transition.state !== this.state;
    this.state = transition.state;
    if (changed) this.notify();
    for (const effect of transition.effects) {
      this.runEffect(effect);
    }
  }

  private notify() {
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }

  private runEffect(effect: SessionEffect) {
    switch (effect.type) {
      case "connect":
        void this.connect(effect.url).then(
          (connection) => {
            if (this.isStopped) {
              connection.close();
              return;
            }
            this.dispatch({ type: "connection/opened", connection });
          },
          (error: unknown) => {
            this.dispatch({ type: "connection/failed", message: describeError(error) });
          }
        );
        return;
      case "read":
        this.read(effect.connection);
        return;
      case "send":
        void effect.connection.send(effect.text).then(
          () => this.dispatch({ type: "send/succeeded", text: effect.text }),
          (error: unknown) => this.dispatch({ type: "send/failed", message: describeError(error) })
        );
        return;
      case "start-keepalive":
        this.keepalive?.stop();
        this.keepalive = startKeepalive({
          connection: effect.connection,
          intervalMs: this.keepaliveIntervalMs,
          timers: this.timers,
          onFailure: (error) => this.dispatch({ type: "keepalive/failed", message: describeError(error) })
        });
        return;
      case "stop-keepalive":
        this.keepalive?.stop();
        this.keepalive = null;
        return;
      case "start-countdown":
        this.ticker?.stop();
        this.ticker = startCountdownTicker({
          deadline: effect.deadline,
          timers: this.timers,
          onTick: (now) => this.dispatch({ type: "clock/tick", now })
        });
        return;
      case "stop-countdown":
        this.ticker?.stop();
        this.ticker = null;
        return;
      case "quit":
        this.shutdown();
        return;
    }
  }

  private read(connection: SessionConnection) {
    if (this.isReading) {
      console.error("[session] read requested while another read is pending");
      return;
    }
    this.isReading = true;
    void decodeNext(connection, this.timers.now).then(
      ({ result, receivedAt }) => {
        this.isReading = false;
        this.dispatch({ type: "socket/frame-decoded", result, receivedAt });
      },
      (error: unknown) => {
        this.isReading = false;
        this.dispatch({ type: "socket/read-failed", message: describeError(error) });
      }
    );
  }

  private shutdown() {
    this.isStopped = true;
    this.ticker?.stop();
    this.ticker = null;
    this.keepalive?.stop();
    this.keepalive = null;
    this.state.connection?.close();
    this.onQuit();
  }
}
