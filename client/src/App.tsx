import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import { useCallback } from "react";
import type { ClientConfig } from "./app/config.js";
import {
  selectErrorText,
  selectHeaderText,
  selectInputPlaceholder,
  selectWordBoxText
} from "./app/state/selectors.js";
import type { SessionRunner } from "./app/state/sessionRunner.js";
import { useSessionState } from "./app/state/useSessionState.js";
import { ChatLogView } from "./app/views/ChatLogView.js";
import { HotkeyHints } from "./app/views/HotkeyHints.js";
import { RoundBanner } from "./app/views/RoundBanner.js";

type Props = {
  runner: SessionRunner;
  config: ClientConfig;
};

export default function App({ runner, config }: Props) {
  const state = useSessionState(runner);
  const { dispatch } = runner;
  const errorText = selectErrorText(state);

  // Ctrl+E would also reach the text input as a typed "e"; Esc does not.
  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      dispatch({ type: "session/quit" });
    } else if (key.escape) {
      dispatch({ type: "error/dismissed" });
    }
  });

  const handleChange = useCallback(
    (value: string) => dispatch({ type: "input/changed", value }),
    [dispatch]
  );
  const handleSubmit = useCallback(
    (value: string) => dispatch({ type: "input/submitted", value }),
    [dispatch]
  );

  return (
    <Box flexDirection="column" width={config.width}>
      <RoundBanner
        headerText={selectHeaderText(state)}
        wordText={selectWordBoxText(state)}
        config={config}
      />
      <ChatLogView messages={state.chatMessages} config={config} />
      <Box width={config.width}>
        <Text>{"> "}</Text>
        <TextInput
          value={state.input}
          placeholder={selectInputPlaceholder(state)}
          onChange={handleChange}
          onSubmit={handleSubmit}
        />
      </Box>
      {errorText !== null && (
        <Box width={config.width}>
          <Text color={config.colors.error}>{errorText}</Text>
        </Box>
      )}
      <HotkeyHints config={config} />
    </Box>
  );
}
