import { decodeServerFrame } from "../../../../shared/protocol.js";
import type { FrameDecodeResult } from "../../../../shared/types.js";
import type { SessionConnection } from "./connection.js";

export type DecodedFrame = {
  result: FrameDecodeResult;
  receivedAt: number;
};

/**
 * Waits for the next frame and decodes it. Transport failures reject with the
 * connection's ReadError; malformed frames resolve with `ok: false`.
 */
export async function decodeNext(
  connection: Pick<SessionConnection, "read">,
  now: () => number
): Promise<DecodedFrame> {
  const raw = await connection.read();
  const receivedAt = now();
  return { result: decodeServerFrame(raw, receivedAt), receivedAt };
}
