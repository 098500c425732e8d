import type { InboundEvent } from "../../../../shared/types.js";
import { appendChatMessage } from "../chat/chatLog.js";
import { interpretSubmission } from "../input/commands.js";
import { AWAITING_START, nextRoundPhase } from "../round/roundPhase.js";
import type { SessionEffect, SessionEvent } from "./actions.js";
import type { InitialSessionStateOptions, SessionError, SessionState } from "./types.js";

export type SessionTransition = {
  state: SessionState;
  effects: SessionEffect[];
};

export function createInitialSessionState(options: InitialSessionStateOptions): SessionState {
  return {
    serverUrl: options.serverUrl,
    connection: null,
    connectionStatus: "connecting",
    error: null,
    chatMessages: [],
    round: AWAITING_START,
    input: "",
    clock: {
      now: options.now
    },
    isQuitting: false
  };
}

function withError(state: SessionState, error: SessionError): SessionState {
  return { ...state, error };
}

// The next read is armed only while the socket is open, one per resolved read.
function rearmRead(state: SessionState): SessionEffect[] {
  if (state.connectionStatus !== "open" || !state.connection) return [];
  return [{ type: "read", connection: state.connection }];
}

function applyInboundEvent(
  state: SessionState,
  event: InboundEvent,
  receivedAt: number,
  issue: string | null
): SessionTransition {
  switch (event.kind) {
    case "chat":
      return {
        state: { ...state, chatMessages: appendChatMessage(state.chatMessages, event.text) },
        effects: rearmRead(state)
      };
    case "round-started":
    case "round-finished": {
      const deadline = event.kind === "round-started" ? event.finishAt : event.nextRoundAt;
      const next: SessionState = {
        ...state,
        round: nextRoundPhase(state.round, event),
        clock: { now: receivedAt },
        error: issue ? { kind: "decode", message: issue } : state.error
      };
      return {
        state: next,
        effects: [{ type: "start-countdown", deadline }, ...rearmRead(state)]
      };
    }
    case "game-finished":
      return {
        state: { ...state, round: nextRoundPhase(state.round, event) },
        effects: [{ type: "stop-countdown" }, ...rearmRead(state)]
      };
    case "pong":
      return { state, effects: rearmRead(state) };
    case "unrecognized":
      return {
        state: withError(state, { kind: "decode", message: `unknown message type: ${event.tag}` }),
        effects: rearmRead(state)
      };
  }
}

function applySubmission(state: SessionState, value: string): SessionTransition {
  const submission = interpretSubmission(value, state.connection !== null);
  switch (submission.kind) {
    case "quit":
      return quit(state);
    case "clear-chat":
      return { state: { ...state, chatMessages: [], input: "" }, effects: [] };
    case "rejected":
      return {
        state: withError(state, { kind: "rejected", message: submission.message }),
        effects: []
      };
    case "ignored":
      return { state, effects: [] };
    case "send":
      if (!state.connection) return { state, effects: [] };
      return {
        state,
        effects: [{ type: "send", connection: state.connection, text: submission.text }]
      };
  }
}

function quit(state: SessionState): SessionTransition {
  if (state.isQuitting) return { state, effects: [] };
  return { state: { ...state, isQuitting: true }, effects: [{ type: "quit" }] };
}

/**
 * Applies one event to the session and lists the work the runner has to start
 * next. Never performs I/O itself.
 */
export function sessionReducer(state: SessionState, event: SessionEvent): SessionTransition {
  if (state.isQuitting) return { state, effects: [] };

  switch (event.type) {
    case "session/start":
      if (state.connection || state.connectionStatus !== "connecting") {
        return { state, effects: [] };
      }
      return { state, effects: [{ type: "connect", url: state.serverUrl }] };
    case "session/quit":
      return quit(state);
    case "connection/opened":
      return {
        state: { ...state, connection: event.connection, connectionStatus: "open" },
        effects: [
          { type: "read", connection: event.connection },
          { type: "start-keepalive", connection: event.connection }
        ]
      };
    case "connection/failed":
      return {
        state: {
          ...state,
          connectionStatus: "failed",
          error: { kind: "connect", message: event.message }
        },
        effects: []
      };
    case "socket/frame-decoded":
      if (!event.result.ok) {
        return {
          state: withError(state, { kind: "decode", message: event.result.error }),
          effects: rearmRead(state)
        };
      }
      return applyInboundEvent(state, event.result.event, event.receivedAt, event.result.issue);
    case "socket/read-failed":
      // No reconnect: the session stays up for display and quit only.
      return {
        state: {
          ...state,
          connectionStatus: "closed",
          error: { kind: "read", message: event.message }
        },
        effects: [{ type: "stop-keepalive" }]
      };
    case "clock/tick":
      return { state: { ...state, clock: { now: event.now } }, effects: [] };
    case "input/changed":
      return { state: { ...state, input: event.value }, effects: [] };
    case "input/submitted":
      return applySubmission(state, event.value);
    case "send/succeeded":
      return { state: { ...state, input: "" }, effects: [] };
    case "send/failed":
      return {
        state: withError(state, { kind: "write", message: event.message }),
        effects: []
      };
    case "keepalive/failed":
      return {
        state: withError(state, { kind: "write", message: event.message }),
        effects: []
      };
    case "error/dismissed":
      return { state: { ...state, error: null }, effects: [] };
    default:
      return { state, effects: [] };
  }
}
