import type { SessionConnection } from "../network/connection.js";
import type { RoundPhase } from "../round/roundPhase.js";

export type ConnectionStatus = "connecting" | "open" | "failed" | "closed";

export type SessionErrorKind = "connect" | "read" | "decode" | "rejected" | "write";

export type SessionError = {
  kind: SessionErrorKind;
  message: string;
};

export type SessionState = {
  serverUrl: string;
  connection: SessionConnection | null;
  connectionStatus: ConnectionStatus;
  // Single slot: the latest error replaces the previous one.
  error: SessionError | null;
  chatMessages: string[];
  round: RoundPhase;
  input: string;
  clock: {
    now: number;
  };
  isQuitting: boolean;
};

export type InitialSessionStateOptions = {
  serverUrl: string;
  now: number;
};
