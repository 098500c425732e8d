import type { InboundEvent } from "../../../../shared/types.js";

export type RoundPhase =
  | { kind: "awaiting-start" }
  | { kind: "active"; word: string; deadline: number }
  | { kind: "revealed"; answer: string; deadline: number };

export const AWAITING_START: RoundPhase = { kind: "awaiting-start" };

/**
 * Round transitions replace the phase outright; events that do not describe a
 * round leave it untouched.
 */
export function nextRoundPhase(phase: RoundPhase, event: InboundEvent): RoundPhase {
  switch (event.kind) {
    case "round-started":
      return { kind: "active", word: event.word, deadline: event.finishAt };
    case "round-finished":
      return { kind: "revealed", answer: event.answer, deadline: event.nextRoundAt };
    case "game-finished":
      return AWAITING_START;
    default:
      return phase;
  }
}

function getRoundDeadline(phase: RoundPhase): number | null {
  return phase.kind === "awaiting-start" ? null : phase.deadline;
}

export function getRemainingMs(phase: RoundPhase, now: number): number {
  const deadline = getRoundDeadline(phase);
  if (deadline === null) return 0;
  return Math.max(0, deadline - now);
}
