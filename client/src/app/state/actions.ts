import type { FrameDecodeResult } from "../../../../shared/types.js";
import type { SessionConnection } from "../network/connection.js";

export type SessionEvent =
  | { type: "session/start" }
  | { type: "session/quit" }
  | { type: "connection/opened"; connection: SessionConnection }
  | { type: "connection/failed"; message: string }
  | { type: "socket/frame-decoded"; result: FrameDecodeResult; receivedAt: number }
  | { type: "socket/read-failed"; message: string }
  | { type: "clock/tick"; now: number }
  | { type: "input/changed"; value: string }
  | { type: "input/submitted"; value: string }
  | { type: "send/succeeded"; text: string }
  | { type: "send/failed"; message: string }
  | { type: "keepalive/failed"; message: string }
  | { type: "error/dismissed" };

export type SessionEffect =
  | { type: "connect"; url: string }
  | { type: "read"; connection: SessionConnection }
  | { type: "send"; connection: SessionConnection; text: string }
  | { type: "start-keepalive"; connection: SessionConnection }
  | { type: "stop-keepalive" }
  | { type: "start-countdown"; deadline: number }
  | { type: "stop-countdown" }
  | { type: "quit" };
