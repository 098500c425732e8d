import { PING_PAYLOAD } from "../../../../shared/protocol.js";
import { CLEAR_COMMAND, EXIT_COMMAND, MANUAL_PING_MESSAGE } from "../constants.js";

export type Submission =
  | { kind: "quit" }
  | { kind: "clear-chat" }
  | { kind: "rejected"; message: string }
  | { kind: "send"; text: string }
  | { kind: "ignored" };

export function interpretSubmission(rawLine: string, isConnected: boolean): Submission {
  const line = rawLine.trim();

  if (line === EXIT_COMMAND) return { kind: "quit" };
  if (line === CLEAR_COMMAND) return { kind: "clear-chat" };
  // The keepalive driver owns ping traffic.
  if (line === PING_PAYLOAD) return { kind: "rejected", message: MANUAL_PING_MESSAGE };
  if (!line) return { kind: "ignored" };
  if (!isConnected) return { kind: "ignored" };

  return { kind: "send", text: line };
}
