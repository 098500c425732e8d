export type OngoingRoundInfoContent = {
  word_to_guess: string;
  round_finish_time: string;
};

export type FinishedRoundInfoContent = {
  word_answer: string;
  to_next_round_time: string;
};

export type ServerFrame =
  | { type: "ChatMessage"; content: string }
  | { type: "OngoingRoundInfo"; content: OngoingRoundInfoContent }
  | { type: "FinishedRoundInfo"; content: FinishedRoundInfoContent }
  | { type: "FinishedGame"; content?: unknown }
  | { type: "PongMessage"; content?: unknown };

export type InboundEvent =
  | { kind: "chat"; text: string }
  | { kind: "round-started"; word: string; finishAt: number }
  | { kind: "round-finished"; answer: string; nextRoundAt: number }
  | { kind: "game-finished" }
  | { kind: "pong" }
  | { kind: "unrecognized"; tag: string };

export type FrameDecodeResult =
  | {
      ok: true;
      event: InboundEvent;
      // Set when the event was built from a fallback value, e.g. an unparsable deadline.
      issue: string | null;
    }
  | {
      ok: false;
      error: string;
    };
