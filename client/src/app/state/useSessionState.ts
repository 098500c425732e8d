import { useSyncExternalStore } from "react";
import type { SessionRunner } from "./sessionRunner.js";
import type { SessionState } from "./types.js";

export function useSessionState(runner: SessionRunner): SessionState {
  return useSyncExternalStore(runner.subscribe, runner.getState);
}
