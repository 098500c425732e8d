import {
  GUIDE_ACTIVE,
  GUIDE_AWAITING_START,
  GUIDE_REVEALED,
  INPUT_PLACEHOLDER_CONNECTING,
  INPUT_PLACEHOLDER_OFFLINE,
  INPUT_PLACEHOLDER_READY
} from "../constants.js";
import { getRemainingMs } from "../round/roundPhase.js";
import type { SessionState } from "./types.js";

export function formatCountdown(remainingMs: number): string {
  const rounded = Math.round(Math.max(0, remainingMs) / 100) * 100;
  const seconds = Math.floor(rounded / 1000);
  const tenths = Math.floor((rounded % 1000) / 100);
  return `${seconds}.${tenths}s`;
}

export function selectGuideText(state: SessionState): string {
  switch (state.round.kind) {
    case "awaiting-start":
      return GUIDE_AWAITING_START;
    case "active":
      return GUIDE_ACTIVE;
    case "revealed":
      return GUIDE_REVEALED;
  }
}

export function selectRemainingMs(state: SessionState): number {
  return getRemainingMs(state.round, state.clock.now);
}

export function selectHeaderText(state: SessionState): string {
  const guide = selectGuideText(state);
  const remainingMs = selectRemainingMs(state);
  if (remainingMs <= 0) return guide;
  return `${guide} - ${formatCountdown(remainingMs)}`;
}

export function selectWordBoxText(state: SessionState): string {
  switch (state.round.kind) {
    case "awaiting-start":
      return "''";
    case "active":
      return `'${state.round.word}'`;
    case "revealed":
      return `'${state.round.answer}'`;
  }
}

export function selectInputPlaceholder(state: SessionState): string {
  switch (state.connectionStatus) {
    case "connecting":
      return INPUT_PLACEHOLDER_CONNECTING;
    case "open":
      return INPUT_PLACEHOLDER_READY;
    case "failed":
    case "closed":
      return INPUT_PLACEHOLDER_OFFLINE;
  }
}

export function selectErrorText(state: SessionState): string | null {
  return state.error?.message ?? null;
}
