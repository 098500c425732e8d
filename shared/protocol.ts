import type { FrameDecodeResult, InboundEvent } from "./types.js";

export const PING_PAYLOAD = "/ping";

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

type TimestampParseResult = { ok: true; value: number } | { ok: false; error: string };

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

// Date.parse rolls out-of-range fields over (Feb 30 becomes Mar 2), so check them first.
function hasValidFields(match: RegExpMatchArray): boolean {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = Number(match[7] ?? "0");
  const offsetMinute = Number(match[8] ?? "0");
  if (month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  if (hour > 23 || minute > 59 || second > 59) return false;
  if (offsetHour > 23 || offsetMinute > 59) return false;
  return true;
}

export function parseRfc3339(text: string): TimestampParseResult {
  const match = RFC3339_PATTERN.exec(text);
  if (!match || !hasValidFields(match)) {
    return { ok: false, error: `cannot parse "${text}" as RFC 3339 time` };
  }
  const value = Date.parse(text);
  if (!Number.isFinite(value)) {
    return { ok: false, error: `cannot parse "${text}" as RFC 3339 time` };
  }
  return { ok: true, value };
}

function readStringField(
  content: Record<string, unknown>,
  frameType: string,
  field: string
): { ok: true; value: string } | { ok: false; error: string } {
  const value = content[field];
  if (typeof value !== "string") {
    return { ok: false, error: `${frameType}: content.${field} must be a string` };
  }
  return { ok: true, value };
}

function decodeDeadline(
  text: string,
  now: number
): { value: number; issue: string | null } {
  const parsed = parseRfc3339(text);
  if (parsed.ok) {
    return { value: parsed.value, issue: null };
  }
  return { value: now, issue: parsed.error };
}

function decodeRoundContent(
  frameType: "OngoingRoundInfo" | "FinishedRoundInfo",
  content: unknown,
  now: number
): FrameDecodeResult {
  if (!isObjectRecord(content)) {
    return { ok: false, error: `${frameType}: content must be an object` };
  }

  if (frameType === "OngoingRoundInfo") {
    const word = readStringField(content, frameType, "word_to_guess");
    if (!word.ok) return word;
    const finishTime = readStringField(content, frameType, "round_finish_time");
    if (!finishTime.ok) return finishTime;

    const deadline = decodeDeadline(finishTime.value, now);
    const event: InboundEvent = { kind: "round-started", word: word.value, finishAt: deadline.value };
    return { ok: true, event, issue: deadline.issue };
  }

  const answer = readStringField(content, frameType, "word_answer");
  if (!answer.ok) return answer;
  const nextRoundTime = readStringField(content, frameType, "to_next_round_time");
  if (!nextRoundTime.ok) return nextRoundTime;

  const deadline = decodeDeadline(nextRoundTime.value, now);
  const event: InboundEvent = {
    kind: "round-finished",
    answer: answer.value,
    nextRoundAt: deadline.value
  };
  return { ok: true, event, issue: deadline.issue };
}

/**
 * Decodes one text frame from the game server.
 *
 * `now` stands in for any deadline that fails to parse, so the round still
 * transitions with an already expired countdown.
 */
export function decodeServerFrame(raw: string, now: number): FrameDecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `invalid frame: ${detail}` };
  }

  if (!isObjectRecord(parsed)) {
    return { ok: false, error: "invalid frame: expected a JSON object" };
  }
  if (typeof parsed.type !== "string") {
    return { ok: false, error: "invalid frame: missing message type" };
  }

  switch (parsed.type) {
    case "ChatMessage":
      if (typeof parsed.content !== "string") {
        return { ok: false, error: "ChatMessage: content must be a string" };
      }
      return { ok: true, event: { kind: "chat", text: parsed.content }, issue: null };
    case "OngoingRoundInfo":
    case "FinishedRoundInfo":
      return decodeRoundContent(parsed.type, parsed.content, now);
    case "FinishedGame":
      return { ok: true, event: { kind: "game-finished" }, issue: null };
    case "PongMessage":
      return { ok: true, event: { kind: "pong" }, issue: null };
    default:
      return { ok: true, event: { kind: "unrecognized", tag: parsed.type }, issue: null };
  }
}
